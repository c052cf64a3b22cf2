/**
 * File name derivation for cache artifacts and index cross-references
 */

import type { Book, BookGroup, Package } from "@helpmirror/catalog-sdk";

export const SETUP_INDEX_FILE_NAME = "HelpContentSetup.msha";
export const PACKAGES_DIRECTORY = "Packages";
export const PACKAGE_FILE_EXTENSION = ".cab";

/** Extensions of the top-level index files a sync regenerates */
export const INDEX_FILE_EXTENSIONS = [".msha", ".xml"] as const;

/**
 * Percent-encodes every character outside the URI-unreserved set.
 * Injective, so two identities never map to the same file name.
 * @example escapeFileComponent("vs/2012 *") === "vs%2F2012%20%2A"
 */
export function escapeFileComponent(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export function packageFileName(pkg: Pick<Package, "name">): string {
  return `${escapeFileComponent(pkg.name)}${PACKAGE_FILE_EXTENSION}`;
}

export function bookFileName(book: Pick<Book, "code">): string {
  return `book-${escapeFileComponent(book.code)}.xml`;
}

export function groupFileName(bookGroup: Pick<BookGroup, "code">): string {
  return `product-${escapeFileComponent(bookGroup.code)}.xml`;
}

/**
 * Whether a top-level file in the cache directory is a generated index
 */
export function isIndexFileName(fileName: string): boolean {
  const lower = fileName.toLowerCase();
  return INDEX_FILE_EXTENSIONS.some((extension) => lower.endsWith(extension));
}
