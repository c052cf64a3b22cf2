/**
 * Catalog payload parsing
 *
 * Turns the XHTML documents served by the catalog service into the catalog
 * model. Elements are identified by their class attribute and looked up among
 * direct children only, so nested lists never leak into their parents.
 */

import * as cheerio from "cheerio";
import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { XMLValidator } from "fast-xml-parser";
import {
  PackageState,
  ParseError,
  type Book,
  type BookGroup,
  type Locale,
  type Package,
} from "@helpmirror/catalog-sdk";

const UTF8_BOM = "\uFEFF";

function decodePayload(bytes: Uint8Array): string {
  const text = new TextDecoder("utf-8").decode(bytes);
  return text.startsWith(UTF8_BOM) ? text.slice(UTF8_BOM.length) : text;
}

function loadDocument(bytes: Uint8Array, payload: string): CheerioAPI {
  if (!bytes || bytes.length === 0) {
    throw new ParseError(`${payload} payload is empty`);
  }

  const xml = decodePayload(bytes);
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(
      `${payload} payload is not well-formed XML: ${msg} (line ${line}, column ${col})`,
    );
  }

  return cheerio.load(xml, { xml: true });
}

/**
 * Returns the single container `html > body > div.<containerClass>`
 */
function requireContainer(
  $: CheerioAPI,
  containerClass: string,
  payload: string,
): Cheerio<Element> {
  const html = $.root().children("html");
  if (html.length === 0) {
    throw new ParseError(`${payload} payload has no <html> root element`);
  }

  const body = html.first().children("body");
  if (body.length === 0) {
    throw new ParseError(`${payload} payload has no <body> element`);
  }

  const container = body.first().children(`div.${containerClass}`);
  if (container.length === 0) {
    throw new ParseError(
      `${payload} payload has no <div class="${containerClass}"> element`,
    );
  }

  return container.first();
}

function optionalText(
  parent: Cheerio<Element>,
  tag: string,
  className: string,
): string | undefined {
  const match = parent.children(`${tag}.${className}`);
  if (match.length === 0) {
    return undefined;
  }
  return match.first().text().trim();
}

function requireText(
  parent: Cheerio<Element>,
  tag: string,
  className: string,
  context: string,
): string {
  const value = optionalText(parent, tag, className);
  if (value === undefined || value.length === 0) {
    throw new ParseError(`Missing <${tag} class="${className}"> in ${context}`);
  }
  return value;
}

function optionalLink(
  parent: Cheerio<Element>,
  className: string,
): string | undefined {
  const href = parent.children(`a.${className}`).first().attr("href")?.trim();
  return href ? href : undefined;
}

function requireLink(
  parent: Cheerio<Element>,
  className: string,
  context: string,
): string {
  const href = optionalLink(parent, className);
  if (!href) {
    throw new ParseError(`Missing <a class="${className}" href> in ${context}`);
  }
  return href;
}

function parseByteCount(value: string, field: string, context: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(`Invalid ${field} "${value}" in ${context}`);
  }
  return Number.parseInt(value, 10);
}

function parseTimestamp(value: string, context: string): Date {
  const timestamp = new Date(value);
  if (Number.isNaN(timestamp.getTime())) {
    throw new ParseError(`Invalid last-modified "${value}" in ${context}`);
  }
  return timestamp;
}

/**
 * Parses the locales list of a product catalog
 * @throws ParseError when the payload is malformed or misses a required element
 */
export function parseLocales(bytes: Uint8Array): Locale[] {
  const $ = loadDocument(bytes, "Locales");
  const container = requireContainer($, "locales", "Locales");

  return container
    .children("div.locale")
    .toArray()
    .map((element, index) => {
      const node = $(element);
      const context = `locale #${index + 1}`;
      const code = requireText(node, "span", "locale", context);
      const name = optionalText(node, "span", "name");

      return {
        code,
        ...(name ? { name } : {}),
        catalogLink: requireLink(node, "locale-link", `locale "${code}"`),
      };
    });
}

function parsePackage(node: Cheerio<Element>, bookContext: string): Package {
  const name = requireText(node, "span", "name", `package in ${bookContext}`);
  const context = `package "${name}"`;
  const uncompressed = optionalText(node, "span", "package-size-bytes-uncompressed");
  const constituentLink = optionalLink(node, "package-constituent-link");

  return {
    name,
    deployed: optionalText(node, "span", "deployed") ?? "",
    lastModified: parseTimestamp(
      requireText(node, "span", "last-modified", context),
      context,
    ),
    etag: optionalText(node, "span", "package-etag") ?? "",
    link: requireLink(node, "current-link", context),
    size: parseByteCount(
      requireText(node, "span", "package-size-bytes", context),
      "package-size-bytes",
      context,
    ),
    uncompressedSize: uncompressed
      ? parseByteCount(uncompressed, "package-size-bytes-uncompressed", context)
      : 0,
    ...(constituentLink ? { constituentLink } : {}),
    state: PackageState.NotDownloaded,
  };
}

function parseBook(
  $: CheerioAPI,
  node: Cheerio<Element>,
  groupName: string,
): Book {
  const code = requireText(node, "span", "id", `book in group "${groupName}"`);
  const context = `book "${code}"`;

  const packages = node
    .children("div.packages")
    .children("div.package")
    .toArray()
    .map((element) => parsePackage($(element), context));

  return {
    code,
    locale: requireText(node, "span", "locale", context),
    name: requireText(node, "span", "name", context),
    description: optionalText(node, "span", "description") ?? "",
    category: optionalText(node, "span", "category") || groupName,
    brandingPackageName: optionalText(node, "span", "BrandingPackageName") ?? "",
    wanted: false,
    packages,
  };
}

/**
 * Parses the book catalog of one locale into book groups
 * @throws ParseError when the payload is malformed or misses a required element
 */
export function parseCatalog(bytes: Uint8Array): BookGroup[] {
  const $ = loadDocument(bytes, "Catalog");
  const container = requireContainer($, "book-groups", "Catalog");

  return container
    .children("div.book-group")
    .toArray()
    .map((element, index) => {
      const node = $(element);
      const code = requireText(node, "span", "id", `book group #${index + 1}`);
      const context = `book group "${code}"`;
      const name = requireText(node, "span", "name", context);

      return {
        code,
        locale: requireText(node, "span", "locale", context),
        name,
        description: optionalText(node, "span", "description") ?? "",
        vendor: optionalText(node, "span", "vendor") ?? "",
        books: node
          .children("div.book")
          .toArray()
          .map((bookElement) => parseBook($, $(bookElement), name)),
      };
    });
}
