import assert from "node:assert";
import { mkdir, utimes, writeFile } from "node:fs/promises";
import path from "node:path";
import { InvalidArgumentError, PackageState } from "@helpmirror/catalog-sdk";
import { reconcile } from "@helpmirror/offline-cache";
import { makeBook, makeBookGroup, makePackage, withTempDir } from "./helpers.js";

const RECORDED_TIME = new Date("2017-03-01T10:00:00.000Z");

async function writePackageFile(
  cacheDirectory: string,
  fileName: string,
  size: number,
  time: Date,
): Promise<void> {
  const packagesDir = path.join(cacheDirectory, "Packages");
  await mkdir(packagesDir, { recursive: true });
  const filePath = path.join(packagesDir, fileName);
  await writeFile(filePath, Buffer.alloc(size));
  await utimes(filePath, time, time);
}

export async function runReconcilerTests(): Promise<void> {
  await withTempDir(async (cacheDirectory) => {
    const missing = makePackage({ name: "Missing", state: PackageState.Ready });
    const matching = makePackage({ name: "X", size: 64, lastModified: RECORDED_TIME });
    const resized = makePackage({ name: "Y", size: 64, lastModified: RECORDED_TIME });
    const retimed = makePackage({ name: "Z", size: 64, lastModified: RECORDED_TIME });

    await writePackageFile(cacheDirectory, "X.cab", 64, RECORDED_TIME);
    await writePackageFile(cacheDirectory, "Y.cab", 65, RECORDED_TIME);
    await writePackageFile(
      cacheDirectory,
      "Z.cab",
      64,
      new Date("2018-01-01T00:00:00.000Z"),
    );

    const bookGroups = [
      makeBookGroup({
        books: [makeBook({ packages: [missing, matching, resized, retimed] })],
      }),
    ];

    await reconcile(bookGroups, cacheDirectory);

    assert.strictEqual(missing.state, PackageState.NotDownloaded);

    // Known-suspicious polarity, pinned as observed: a file that matches the
    // recorded metadata is reported OutOfDate, one that differs is Ready.
    assert.strictEqual(matching.state, PackageState.OutOfDate);
    assert.strictEqual(resized.state, PackageState.Ready);
    assert.strictEqual(retimed.state, PackageState.Ready);

    // Idempotent
    await reconcile(bookGroups, cacheDirectory);
    assert.deepStrictEqual(
      [missing.state, matching.state, resized.state, retimed.state],
      [
        PackageState.NotDownloaded,
        PackageState.OutOfDate,
        PackageState.Ready,
        PackageState.Ready,
      ],
    );

    await reconcile([], cacheDirectory);

    await assert.rejects(
      reconcile(bookGroups, ""),
      (error: unknown) =>
        error instanceof InvalidArgumentError && error.argument === "cacheDirectory",
    );
  });
}
