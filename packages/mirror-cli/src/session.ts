import {
  InvalidArgumentError,
  createLogger,
  type BookGroup,
} from "@helpmirror/catalog-sdk";
import { CatalogHttpClient, CatalogService } from "@helpmirror/catalog-service";
import {
  HttpPackageTransport,
  SyncEngine,
  applyDefaultSelection,
  reconcile,
  verifyCabinetFile,
} from "@helpmirror/offline-cache";
import type { MirrorSettings } from "./config/index.js";

/**
 * Collaborators of one CLI invocation. `close` releases every connection.
 */
export interface MirrorSession {
  catalog: CatalogService;
  createEngine(): SyncEngine;
  close(): Promise<void>;
}

export type SessionFactory = (settings: MirrorSettings) => MirrorSession;

export const openMirrorSession: SessionFactory = (settings) => {
  const http = new CatalogHttpClient({
    baseUrl: settings.servicesBaseUrl,
    proxy: settings.proxy,
    timeoutMs: settings.requestTimeoutMs,
  });

  return {
    catalog: new CatalogService(http, { logger: createLogger("catalog-service") }),
    createEngine: () =>
      new SyncEngine({
        transportFactory: () =>
          new HttpPackageTransport({
            maxRetries: settings.download.maxRetries,
            retryDelay: settings.download.retryDelayMs,
            idleTimeout: settings.download.idleTimeoutMs,
            proxy: settings.proxy,
          }),
        verifier: verifyCabinetFile,
        packagesBaseUrl: settings.packagesBaseUrl,
        progressIntervalMs: settings.download.progressIntervalMs,
        logger: createLogger("sync-engine"),
      }),
    close: () => http.close(),
  };
};

/**
 * Loads the catalog of a product locale, reconciles it against the cache
 * and pre-selects the books already partly cached
 */
export async function loadCachedCatalog(
  session: MirrorSession,
  productToken: string,
  localeCode: string,
  cacheDirectory: string,
): Promise<BookGroup[]> {
  const locales = await session.catalog.loadLocales(productToken);
  const locale = CatalogService.findLocale(locales, localeCode);
  if (!locale) {
    const available = locales.map((entry) => entry.code).join(", ");
    throw new InvalidArgumentError(
      "locale",
      `Locale '${localeCode}' is not available for ${productToken} (available: ${available || "none"})`,
    );
  }

  const bookGroups = await session.catalog.loadBookGroups(locale.catalogLink);
  await reconcile(bookGroups, cacheDirectory);
  applyDefaultSelection(bookGroups);
  return bookGroups;
}
