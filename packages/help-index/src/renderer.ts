/**
 * Index file rendering
 *
 * Produces the three tiers of index files the help viewer reads from a cache
 * directory: the setup index, one index per book group, one per wanted book.
 * Output depends only on the model, so unchanged catalogs render identically.
 */

import type { Book, BookGroup, Package } from "@helpmirror/catalog-sdk";
import {
  PACKAGES_DIRECTORY,
  bookFileName,
  groupFileName,
  packageFileName,
} from "./file-names.js";

const XHTML_NAMESPACE = "http://www.w3.org/1999/xhtml";

export function escapeXml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

function span(className: string, value: string | number): string {
  return `<span class="${className}">${escapeXml(String(value))}</span>`;
}

function link(className: string, href: string, text: string): string {
  return `<a class="${className}" href="${escapeXml(href)}">${escapeXml(text)}</a>`;
}

function indent(depth: number, lines: string[]): string[] {
  const padding = "  ".repeat(depth);
  return lines.map((line) => `${padding}${line}`);
}

function div(className: string, children: string[]): string[] {
  return [`<div class="${className}">`, ...indent(1, children), "</div>"];
}

function document(bodyClass: string, sections: string[][]): string {
  const lines = [
    `<html xmlns="${XHTML_NAMESPACE}">`,
    "  <head />",
    `  <body class="${bodyClass}">`,
    ...sections.flatMap((section) => indent(2, section)),
    "  </body>",
    "</html>",
  ];
  return `${lines.join("\n")}\n`;
}

/**
 * Top-level index listing every book group, wanted or not
 */
export function renderSetupIndex(bookGroups: readonly BookGroup[]): string {
  return document(
    "product-list",
    bookGroups.map((bookGroup) => {
      const fileName = groupFileName(bookGroup);
      return div("product", [
        span("locale", bookGroup.locale),
        span("name", bookGroup.name),
        span("description", bookGroup.description),
        link("product-link", fileName, fileName),
      ]);
    }),
  );
}

/**
 * Group index listing the display metadata of every book in the group
 */
export function renderGroupIndex(bookGroup: BookGroup): string {
  const details = div("details", [
    span("name", bookGroup.name),
    span("description", bookGroup.description),
    span("vendor", bookGroup.vendor),
    span("locale", bookGroup.locale),
  ]);

  const books = bookGroup.books.map((book) => {
    const fileName = bookFileName(book);
    return div("book", [
      span("id", book.code),
      span("locale", book.locale),
      span("name", book.name),
      span("description", book.description),
      span("BrandingPackageName", book.brandingPackageName),
      link("book-link", fileName, fileName),
    ]);
  });

  return document("book-list", [details, ...books]);
}

function renderPackage(pkg: Package): string[] {
  const fileName = packageFileName(pkg);
  const children = [
    span("name", pkg.name),
    span("deployed", pkg.deployed),
    span("last-modified", pkg.lastModified.toISOString()),
    span("package-etag", pkg.etag),
    link("current-link", `${PACKAGES_DIRECTORY}\\${fileName}`, fileName),
    span("package-size-bytes", pkg.size),
    span("package-size-bytes-uncompressed", pkg.uncompressedSize),
  ];

  if (pkg.constituentLink) {
    children.push(
      link("package-constituent-link", pkg.constituentLink, pkg.name),
    );
  }

  return div("package", children);
}

/**
 * Book index listing the packages of one wanted book
 */
export function renderBookIndex(bookGroup: BookGroup, book: Book): string {
  const details = div("details", [
    span("name", book.name),
    span("description", book.description),
    span("vendor", bookGroup.vendor),
    span("locale", book.locale),
  ]);

  return document("package-list", [details, ...book.packages.map(renderPackage)]);
}
