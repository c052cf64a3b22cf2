export {
  CatalogService,
  KNOWN_PRODUCTS,
  PACKAGES_BASE_URL,
  SERVICES_BASE_URL,
} from "./catalogService.js";
export type { CatalogServiceOptions } from "./catalogService.js";

export { CatalogHttpClient } from "./httpClient.js";
export type {
  CatalogFetcher,
  CatalogHttpClientOptions,
  HttpResponse,
} from "./httpClient.js";
