/**
 * Book selection helpers
 */

import { PackageState, type Book, type BookGroup } from "@helpmirror/catalog-sdk";
import type { BookSummary } from "./types.js";

/**
 * Sizes and package counts of a book, based on reconciled package states
 */
export function summarizeBook(book: Book): BookSummary {
  let totalSize = 0;
  let downloadSize = 0;
  let packagesOutOfDate = 0;
  let packagesCached = 0;

  for (const pkg of book.packages) {
    totalSize += pkg.size;
    if (pkg.state !== PackageState.Ready) {
      downloadSize += pkg.size;
      packagesOutOfDate++;
    }
    if (pkg.state !== PackageState.NotDownloaded) {
      packagesCached++;
    }
  }

  return {
    totalSize,
    downloadSize,
    packagesOutOfDate,
    packagesCached,
    packageCount: book.packages.length,
  };
}

/**
 * Pre-selects every book with more than one package already cached
 */
export function applyDefaultSelection(bookGroups: readonly BookGroup[]): void {
  for (const bookGroup of bookGroups) {
    for (const book of bookGroup.books) {
      book.wanted = summarizeBook(book).packagesCached > 1;
    }
  }
}

/**
 * Marks books matching any of `names` (book name or code, case-insensitive)
 * as wanted. Returns the names that matched no book.
 */
export function selectBooks(
  bookGroups: readonly BookGroup[],
  names: readonly string[],
): string[] {
  const remaining = new Map(
    names.map((name): [string, string] => [name.toLowerCase(), name]),
  );
  const requested = new Set(remaining.keys());

  for (const bookGroup of bookGroups) {
    for (const book of bookGroup.books) {
      const candidates = [book.name.toLowerCase(), book.code.toLowerCase()];
      const matches = candidates.filter((candidate) => requested.has(candidate));
      if (matches.length > 0) {
        book.wanted = true;
        matches.forEach((match) => remaining.delete(match));
      }
    }
  }

  return Array.from(remaining.values());
}

/**
 * Clears the wanted flag of every book
 */
export function clearSelection(bookGroups: readonly BookGroup[]): void {
  for (const bookGroup of bookGroups) {
    for (const book of bookGroup.books) {
      book.wanted = false;
    }
  }
}
