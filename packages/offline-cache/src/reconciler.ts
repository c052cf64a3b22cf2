/**
 * Cache Reconciler
 *
 * Compares every package of the catalog against the cache directory and
 * records the result in the package's state.
 */

import {
  InvalidArgumentError,
  PackageState,
  type BookGroup,
} from "@helpmirror/catalog-sdk";
import { statIfExists, withFilesystemError } from "./utils/file-system.js";
import { buildPackagePath } from "./utils/paths.js";

/**
 * Assigns a state to every package in place.
 *
 * - no file at `<cache>/Packages/<name>.cab`: NotDownloaded
 * - file whose mtime and length equal the recorded metadata: OutOfDate
 * - file that differs from the recorded metadata: Ready
 *
 * The last two read inverted against their names. The polarity is kept as
 * observed until its intent is confirmed; see the reconciler tests.
 *
 * @throws InvalidArgumentError when bookGroups or cacheDirectory is missing
 * @throws FilesystemError when a package file cannot be inspected
 */
export async function reconcile(
  bookGroups: readonly BookGroup[],
  cacheDirectory: string,
): Promise<void> {
  if (!bookGroups) {
    throw new InvalidArgumentError("bookGroups");
  }
  if (!cacheDirectory) {
    throw new InvalidArgumentError("cacheDirectory");
  }

  for (const bookGroup of bookGroups) {
    for (const book of bookGroup.books) {
      for (const pkg of book.packages) {
        const packagePath = buildPackagePath(cacheDirectory, pkg);
        const stats = await withFilesystemError(packagePath, "inspect", () =>
          statIfExists(packagePath),
        );

        if (!stats) {
          pkg.state = PackageState.NotDownloaded;
        } else if (
          stats.mtime.getTime() === pkg.lastModified.getTime() &&
          stats.size === pkg.size
        ) {
          pkg.state = PackageState.OutOfDate;
        } else {
          pkg.state = PackageState.Ready;
        }
      }
    }
  }
}
