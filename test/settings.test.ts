import assert from "node:assert";
import { writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { InvalidArgumentError } from "@helpmirror/catalog-sdk";
import {
  DOWNLOAD_CONFIG,
  SERVICE_CONFIG,
  loadSettings,
  parseSettings,
  resolveCacheDirectory,
  resolveLogDirectory,
} from "@helpmirror/mirror-cli";
import { withTempDir } from "./helpers.js";

function assertInvalidSettings(error: unknown, message: string | RegExp): boolean {
  assert.ok(error instanceof InvalidArgumentError);
  assert.strictEqual(error.argument, "settings");
  if (typeof message === "string") {
    assert.strictEqual(error.message, message);
  } else {
    assert.match(error.message, message);
  }
  return true;
}

export async function runSettingsTests(): Promise<void> {
  const defaults = parseSettings({});
  assert.deepStrictEqual(defaults, {
    servicesBaseUrl: SERVICE_CONFIG.SERVICES_BASE_URL,
    packagesBaseUrl: SERVICE_CONFIG.PACKAGES_BASE_URL,
    requestTimeoutMs: SERVICE_CONFIG.REQUEST_TIMEOUT_MS,
    download: {
      maxRetries: DOWNLOAD_CONFIG.MAX_RETRY_ATTEMPTS,
      retryDelayMs: DOWNLOAD_CONFIG.RETRY_DELAY_MS,
      idleTimeoutMs: DOWNLOAD_CONFIG.IDLE_TIMEOUT_MS,
      progressIntervalMs: DOWNLOAD_CONFIG.PROGRESS_INTERVAL_MS,
    },
  });

  const proxied = parseSettings({
    proxy: {
      address: "http://proxy.example.test:8080",
      login: "mirror",
      password: "test-secret",
      domain: "CORP",
    },
    download: { maxRetries: 5 },
  });
  assert.strictEqual(proxied.proxy?.domain, "CORP");
  assert.strictEqual(proxied.download.maxRetries, 5);
  assert.strictEqual(proxied.download.retryDelayMs, DOWNLOAD_CONFIG.RETRY_DELAY_MS);

  assert.throws(
    () => parseSettings({ download: { maxRetries: 0 } }),
    (error: unknown) =>
      assertInvalidSettings(
        error,
        "Invalid settings: download.maxRetries: Number must be greater than or equal to 1",
      ),
  );
  assert.throws(
    () => parseSettings({ colour: "blue" }),
    (error: unknown) => assertInvalidSettings(error, /^Invalid settings: \(root\): .*colour/),
  );

  await withTempDir(async (dir) => {
    // The default file is optional
    assert.deepStrictEqual(await loadSettings(undefined, {}, dir), defaults);

    // An explicit one is not
    await assert.rejects(loadSettings("absent.json", {}, dir), (error: unknown) =>
      assertInvalidSettings(error, /^Cannot read settings file '.*absent\.json'/),
    );
    await assert.rejects(
      loadSettings(undefined, { HELPMIRROR_CONFIG: "absent.json" }, dir),
      InvalidArgumentError,
    );

    await writeFile(path.join(dir, "helpmirror.json"), "{ not json");
    await assert.rejects(loadSettings(undefined, {}, dir), (error: unknown) =>
      assertInvalidSettings(error, /is not valid JSON/),
    );

    await writeFile(
      path.join(dir, "custom.json"),
      JSON.stringify({ cacheDirectory: "mirror", requestTimeoutMs: 1000 }),
    );
    const custom = await loadSettings(undefined, { HELPMIRROR_CONFIG: "custom.json" }, dir);
    assert.strictEqual(custom.cacheDirectory, "mirror");
    assert.strictEqual(custom.requestTimeoutMs, 1000);
  });

  // Cache directory precedence: flag, environment, settings, default
  const settings = parseSettings({ cacheDirectory: "/srv/settings-cache" });
  const env = { HELPMIRROR_CACHE_DIR: "/srv/env-cache" };
  assert.strictEqual(resolveCacheDirectory(settings, "/srv/flag-cache", env), "/srv/flag-cache");
  assert.strictEqual(resolveCacheDirectory(settings, undefined, env), "/srv/env-cache");
  assert.strictEqual(resolveCacheDirectory(settings, undefined, {}), "/srv/settings-cache");
  assert.strictEqual(
    resolveCacheDirectory(defaults, undefined, {}),
    path.join(os.homedir(), "Downloads", "MSDN Library"),
  );

  assert.strictEqual(resolveLogDirectory(defaults, undefined, {}), undefined);
  assert.strictEqual(
    resolveLogDirectory(defaults, undefined, { HELPMIRROR_LOG_DIR: "/var/log/mirror" }),
    "/var/log/mirror",
  );
}
