/**
 * Path Utilities
 *
 * Handles path construction for the cache directory layout:
 *
 *   <cache>/HelpContentSetup.msha
 *   <cache>/product-<group>.xml
 *   <cache>/book-<book>.xml
 *   <cache>/Packages/<package>.cab
 */

import * as path from "node:path";
import type { Book, BookGroup, Package } from "@helpmirror/catalog-sdk";
import {
  PACKAGES_DIRECTORY,
  SETUP_INDEX_FILE_NAME,
  bookFileName,
  groupFileName,
  packageFileName,
} from "@helpmirror/help-index";

export interface CachePaths {
  cacheDir: string;
  packagesDir: string;
  setupIndexFile: string;
}

export function buildCachePaths(cacheDir: string): CachePaths {
  return {
    cacheDir,
    packagesDir: path.join(cacheDir, PACKAGES_DIRECTORY),
    setupIndexFile: path.join(cacheDir, SETUP_INDEX_FILE_NAME),
  };
}

export function buildPackagePath(cacheDir: string, pkg: Pick<Package, "name">): string {
  return path.join(cacheDir, PACKAGES_DIRECTORY, packageFileName(pkg));
}

export function buildGroupIndexPath(cacheDir: string, bookGroup: Pick<BookGroup, "code">): string {
  return path.join(cacheDir, groupFileName(bookGroup));
}

export function buildBookIndexPath(cacheDir: string, book: Pick<Book, "code">): string {
  return path.join(cacheDir, bookFileName(book));
}

/**
 * Key under which a package is deduplicated and matched against cached files
 */
export function packageKey(pkg: Pick<Package, "name">): string {
  return pkg.name.toUpperCase();
}
