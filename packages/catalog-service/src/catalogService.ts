import {
  InvalidArgumentError,
  createLogger,
  type BookGroup,
  type Locale,
  type MirrorLogger,
  type Product,
} from "@helpmirror/catalog-sdk";
import { parseCatalog, parseLocales } from "@helpmirror/help-index";
import type { CatalogFetcher } from "./httpClient.js";

export const SERVICES_BASE_URL = "https://services.mtps.microsoft.com/serviceapi/";
export const PACKAGES_BASE_URL = "https://packages.mtps.microsoft.com/";

export const KNOWN_PRODUCTS: readonly Product[] = [
  { token: "visualstudio11", name: "Visual Studio 2012" },
  { token: "visualstudio12", name: "Visual Studio 2013" },
  { token: "dev14", name: "Visual Studio 2015" },
  { token: "dev15", name: "Visual Studio 2017" },
];

export interface CatalogServiceOptions {
  logger?: MirrorLogger;
}

/**
 * Loads the remote catalog into a fresh model on every call
 */
export class CatalogService {
  private readonly logger: MirrorLogger;

  constructor(
    private readonly fetcher: CatalogFetcher,
    options: CatalogServiceOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("catalog-service");
  }

  /**
   * Locales available for a product version token, e.g. "dev15"
   */
  async loadLocales(versionToken: string): Promise<Locale[]> {
    if (!versionToken) {
      throw new InvalidArgumentError("versionToken");
    }

    const catalogPath = `catalogs/${encodeURIComponent(versionToken)}`;
    this.logger.debug("Downloading locales list", { path: catalogPath });

    const locales = parseLocales(await this.fetcher.getBytes(catalogPath));
    this.logger.info("Locales loaded", { versionToken, count: locales.length });
    return locales;
  }

  /**
   * Book groups of a locale, from the catalog link carried by the Locale
   */
  async loadBookGroups(catalogLink: string): Promise<BookGroup[]> {
    if (!catalogLink) {
      throw new InvalidArgumentError("catalogLink");
    }

    this.logger.debug("Downloading books list", { path: catalogLink });

    const bookGroups = parseCatalog(await this.fetcher.getBytes(catalogLink));
    this.logger.info("Book catalog loaded", {
      bookGroups: bookGroups.length,
      books: bookGroups.reduce((sum, group) => sum + group.books.length, 0),
    });
    return bookGroups;
  }

  /**
   * Finds a locale by code (case-insensitive)
   */
  static findLocale(locales: readonly Locale[], code: string): Locale | undefined {
    const wanted = code.toLowerCase();
    return locales.find((locale) => locale.code.toLowerCase() === wanted);
  }
}
