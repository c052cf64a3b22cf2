/**
 * Text output of the CLI
 */

import type {
  BookGroup,
  Locale,
  PackageDownloadStatus,
  Product,
} from "@helpmirror/catalog-sdk";
import type { SyncResult } from "@helpmirror/offline-cache";
import { summarizeBook } from "@helpmirror/offline-cache";

export function formatMegabytes(bytes: number): string {
  return `${(bytes / 1_000_000).toFixed(1)} MB`;
}

export function formatProducts(products: readonly Product[]): string[] {
  return products.map((product) => `${product.token.padEnd(16)}${product.name}`);
}

export function formatLocales(locales: readonly Locale[]): string[] {
  return locales.map((locale) =>
    locale.name ? `${locale.code.padEnd(8)}${locale.name}` : locale.code,
  );
}

/**
 * One heading per category, then one line per book:
 * `  [x] <name> (<code>) - <size>, <n> packages, <size> to download, <n> out of date`
 */
export function formatBookTable(bookGroups: readonly BookGroup[]): string[] {
  const categories = new Map<string, string[]>();

  for (const bookGroup of bookGroups) {
    for (const book of bookGroup.books) {
      const summary = summarizeBook(book);
      const line =
        `  ${book.wanted ? "[x]" : "[ ]"} ${book.name} (${book.code}) - ` +
        `${formatMegabytes(summary.totalSize)}, ${summary.packageCount} packages, ` +
        `${formatMegabytes(summary.downloadSize)} to download, ` +
        `${summary.packagesOutOfDate} out of date`;

      const lines = categories.get(book.category);
      if (lines) {
        lines.push(line);
      } else {
        categories.set(book.category, [line]);
      }
    }
  }

  const output: string[] = [];
  for (const [category, lines] of categories) {
    output.push(category, ...lines);
  }
  return output;
}

export function formatDownloadStatus(status: PackageDownloadStatus): string {
  if (status.bytesDownloaded < 0) {
    return status.percent >= 100
      ? `Downloaded ${status.filename}`
      : `Downloading ${status.filename} ...`;
  }
  if (status.bytesToDownload < 0) {
    return `Downloading ${status.filename} (${formatMegabytes(status.bytesDownloaded)})`;
  }
  return (
    `Downloading ${status.filename} ${status.percent}% ` +
    `(${formatMegabytes(status.bytesDownloaded)} of ${formatMegabytes(status.bytesToDownload)})`
  );
}

export function formatSyncResult(result: SyncResult): string {
  return (
    `${result.packagesDownloaded} of ${result.packagesTotal} packages downloaded, ` +
    `${result.packagesSkipped} up to date, ${result.orphansRemoved.length} removed`
  );
}
