import assert from "node:assert";
import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { Agent, MockAgent, ProxyAgent } from "undici";
import { NetworkError, basicToken, createDispatcher } from "@helpmirror/catalog-sdk";
import { CatalogHttpClient } from "@helpmirror/catalog-service";
import { HttpPackageTransport, verifyCabinetFile } from "@helpmirror/offline-cache";
import { LOCALES_XHTML } from "./fixtures.js";
import { cabinetBytes, withTempDir } from "./helpers.js";

const PACKAGES_ORIGIN = "https://packages.example.test";
const SERVICES_ORIGIN = "https://services.example.test";

function createMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

async function testPackageDownload(): Promise<void> {
  await withTempDir(async (dir) => {
    const agent = createMockAgent();
    const body = cabinetBytes(64);
    agent
      .get(PACKAGES_ORIGIN)
      .intercept({ path: "/packages/a.cab", method: "GET" })
      .reply(200, body, { headers: { "content-length": String(body.length) } });

    const transport = new HttpPackageTransport({ dispatcher: agent, retryDelay: 0 });
    const ticks: Array<[number, number]> = [];
    const destination = path.join(dir, "Packages", "A.cab");

    try {
      await transport.download(
        `${PACKAGES_ORIGIN}/packages/a.cab`,
        destination,
        (received, total) => ticks.push([received, total]),
      );
    } finally {
      await transport.close();
    }

    assert.deepStrictEqual(await readFile(destination), body);
    assert.deepStrictEqual(ticks[ticks.length - 1], [64, 64]);
    assert.strictEqual(await verifyCabinetFile(destination), true);

    await assert.rejects(
      transport.download(`${PACKAGES_ORIGIN}/packages/a.cab`, destination, () => {}),
      /Package transport is closed/,
    );
  });
}

async function testClientErrorIsNotRetried(): Promise<void> {
  await withTempDir(async (dir) => {
    const agent = createMockAgent();
    agent
      .get(PACKAGES_ORIGIN)
      .intercept({ path: "/packages/missing.cab", method: "GET" })
      .reply(404, "not found");

    const transport = new HttpPackageTransport({ dispatcher: agent, retryDelay: 0 });
    try {
      await assert.rejects(
        transport.download(
          `${PACKAGES_ORIGIN}/packages/missing.cab`,
          path.join(dir, "missing.cab"),
          () => {},
        ),
        (error: unknown) => {
          assert.ok(error instanceof NetworkError);
          assert.strictEqual(error.status, 404);
          assert.ok(error.message.startsWith("HTTP 404"));
          return true;
        },
      );
    } finally {
      await transport.close();
    }
  });
}

async function testServerErrorIsRetried(): Promise<void> {
  await withTempDir(async (dir) => {
    const agent = createMockAgent();
    agent
      .get(PACKAGES_ORIGIN)
      .intercept({ path: "/packages/b.cab", method: "GET" })
      .reply(500, "boom")
      .times(2);

    const transport = new HttpPackageTransport({
      dispatcher: agent,
      maxRetries: 2,
      retryDelay: 0,
    });
    try {
      await assert.rejects(
        transport.download(`${PACKAGES_ORIGIN}/packages/b.cab`, path.join(dir, "b.cab"), () => {}),
        (error: unknown) => {
          assert.ok(error instanceof NetworkError);
          assert.strictEqual(error.status, 500);
          assert.ok(
            error.message.startsWith(
              `Failed to download ${PACKAGES_ORIGIN}/packages/b.cab after 2 attempts`,
            ),
          );
          return true;
        },
      );
      agent.assertNoPendingInterceptors();
    } finally {
      await transport.close();
    }
  });
}

async function testIdleTimeout(): Promise<void> {
  await withTempDir(async (dir) => {
    const agent = createMockAgent();
    agent
      .get(PACKAGES_ORIGIN)
      .intercept({ path: "/packages/slow.cab", method: "GET" })
      .reply(200, cabinetBytes(16))
      .delay(500)
      .times(2);

    const transport = new HttpPackageTransport({
      dispatcher: agent,
      maxRetries: 2,
      retryDelay: 0,
      idleTimeout: 50,
    });
    const ticks: Array<[number, number]> = [];
    try {
      await assert.rejects(
        transport.download(
          `${PACKAGES_ORIGIN}/packages/slow.cab`,
          path.join(dir, "slow.cab"),
          (received, total) => ticks.push([received, total]),
        ),
        (error: unknown) => {
          assert.ok(error instanceof NetworkError);
          assert.strictEqual(error.status, undefined);
          assert.ok(
            error.message.startsWith(
              `Failed to download ${PACKAGES_ORIGIN}/packages/slow.cab after 2 attempts: `,
            ),
          );
          return true;
        },
      );
    } finally {
      await transport.close();
    }

    // The second attempt announces its restart and then never receives data
    assert.deepStrictEqual(ticks, [[0, -1]]);
  });
}

async function testRetryRestartsProgress(): Promise<void> {
  await withTempDir(async (dir) => {
    const agent = createMockAgent();
    const body = cabinetBytes(64);
    const pool = agent.get(PACKAGES_ORIGIN);
    pool.intercept({ path: "/packages/c.cab", method: "GET" }).reply(500, "boom");
    pool
      .intercept({ path: "/packages/c.cab", method: "GET" })
      .reply(200, body, { headers: { "content-length": String(body.length) } });

    const transport = new HttpPackageTransport({
      dispatcher: agent,
      maxRetries: 2,
      retryDelay: 0,
    });
    const ticks: Array<[number, number]> = [];
    const destination = path.join(dir, "c.cab");
    try {
      await transport.download(
        `${PACKAGES_ORIGIN}/packages/c.cab`,
        destination,
        (received, total) => ticks.push([received, total]),
      );
    } finally {
      await transport.close();
    }

    assert.deepStrictEqual(ticks[0], [0, -1]);
    assert.deepStrictEqual(ticks[ticks.length - 1], [64, 64]);
    assert.deepStrictEqual(await readFile(destination), body);
  });
}

async function testProxyDispatcher(): Promise<void> {
  assert.strictEqual(
    basicToken({ address: "http://proxy.example.test:8080", login: "user", password: "pw", domain: "CORP" }),
    "Basic Q09SUFx1c2VyOnB3",
  );
  assert.strictEqual(
    basicToken({ address: "http://proxy.example.test:8080", login: "user", password: "pw" }),
    "Basic dXNlcjpwdw==",
  );
  assert.strictEqual(
    basicToken({ address: "http://proxy.example.test:8080", login: "user" }),
    "Basic dXNlcjo=",
  );
  assert.strictEqual(
    basicToken({ address: "http://proxy.example.test:8080", password: "pw", domain: "CORP" }),
    undefined,
  );

  const direct = createDispatcher();
  const proxied = createDispatcher({ address: "http://proxy.example.test:8080", login: "user" });
  try {
    assert.ok(direct instanceof Agent);
    assert.ok(proxied instanceof ProxyAgent);
  } finally {
    await direct.close();
    await proxied.close();
  }
}

async function testCatalogHttpClient(): Promise<void> {
  const agent = createMockAgent();
  const pool = agent.get(SERVICES_ORIGIN);
  pool
    .intercept({ path: "/serviceapi/catalogs/dev15", method: "GET" })
    .reply(200, LOCALES_XHTML);
  pool
    .intercept({ path: "/serviceapi/catalogs/none", method: "GET" })
    .reply(404, "not found");

  const client = new CatalogHttpClient({
    baseUrl: `${SERVICES_ORIGIN}/serviceapi/`,
    dispatcher: agent,
  });

  try {
    assert.strictEqual(
      client.resolve("catalogs/dev15"),
      `${SERVICES_ORIGIN}/serviceapi/catalogs/dev15`,
    );

    const bytes = await client.getBytes("catalogs/dev15");
    assert.strictEqual(new TextDecoder().decode(bytes), LOCALES_XHTML);

    await assert.rejects(client.getBytes("catalogs/none"), (error: unknown) => {
      assert.ok(error instanceof NetworkError);
      assert.strictEqual(error.status, 404);
      assert.strictEqual(error.url, `${SERVICES_ORIGIN}/serviceapi/catalogs/none`);
      return true;
    });
  } finally {
    await client.close();
  }
}

async function testCatalogRequestTimeout(): Promise<void> {
  const agent = createMockAgent();
  agent
    .get(SERVICES_ORIGIN)
    .intercept({ path: "/serviceapi/catalogs/slow", method: "GET" })
    .reply(200, LOCALES_XHTML)
    .delay(500);

  const client = new CatalogHttpClient({
    baseUrl: `${SERVICES_ORIGIN}/serviceapi/`,
    dispatcher: agent,
    timeoutMs: 50,
  });

  try {
    await assert.rejects(client.getBytes("catalogs/slow"), (error: unknown) => {
      assert.ok(error instanceof NetworkError);
      assert.strictEqual(error.status, undefined);
      assert.ok(
        error.message.startsWith(`Request to ${SERVICES_ORIGIN}/serviceapi/catalogs/slow failed: `),
      );
      return true;
    });
  } finally {
    await client.close();
  }
}

async function testCabinetVerifier(): Promise<void> {
  await withTempDir(async (dir) => {
    const valid = path.join(dir, "valid.cab");
    const truncated = path.join(dir, "truncated.cab");
    const unsigned = path.join(dir, "unsigned.cab");

    await writeFile(valid, cabinetBytes(40));
    await writeFile(truncated, cabinetBytes(40).subarray(0, 30));
    await writeFile(unsigned, Buffer.alloc(40));

    assert.strictEqual(await verifyCabinetFile(valid), true);
    assert.strictEqual(await verifyCabinetFile(truncated), false);
    assert.strictEqual(await verifyCabinetFile(unsigned), false);
    assert.strictEqual(await verifyCabinetFile(path.join(dir, "absent.cab")), false);
  });
}

export async function runTransportTests(): Promise<void> {
  await testPackageDownload();
  await testClientErrorIsNotRetried();
  await testServerErrorIsRetried();
  await testIdleTimeout();
  await testRetryRestartsProgress();
  await testProxyDispatcher();
  await testCatalogHttpClient();
  await testCatalogRequestTimeout();
  await testCabinetVerifier();
}
