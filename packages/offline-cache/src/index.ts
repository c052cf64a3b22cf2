/**
 * @helpmirror/offline-cache
 *
 * Keeps a local help content cache in line with a catalog: reconciles package
 * states, downloads what wanted books need, and regenerates the index files.
 */

// Main classes
export { SyncEngine } from "./sync-engine.js";
export { HttpPackageTransport } from "./utils/package-downloader.js";
export { ProgressThrottle } from "./utils/progress-throttle.js";

// Operations
export { reconcile } from "./reconciler.js";
export { verifyCabinetFile } from "./trust.js";
export {
  summarizeBook,
  applyDefaultSelection,
  selectBooks,
  clearSelection,
} from "./selection.js";

// Types
export type {
  PackageTransport,
  PackageTransportFactory,
  TrustVerifier,
  SyncEngineOptions,
  SyncResult,
  BookSummary,
} from "./types.js";

export type { PackageDownloaderOptions } from "./utils/package-downloader.js";
export type { ProgressThrottleOptions } from "./utils/progress-throttle.js";
export type { CachePaths } from "./utils/paths.js";

// Utilities
export {
  buildCachePaths,
  buildPackagePath,
  buildGroupIndexPath,
  buildBookIndexPath,
  packageKey,
} from "./utils/paths.js";
