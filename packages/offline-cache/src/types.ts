/**
 * Offline Cache Types
 *
 * Collaborator contracts of the sync engine and the shapes it reports back.
 */

import type {
  MirrorLogger,
  TransferProgressCallback,
} from "@helpmirror/catalog-sdk";

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Network transport for package files.
 * Acquired once per sync and closed on every exit path.
 */
export interface PackageTransport {
  /**
   * Streams `url` into `destination`, reporting bytes received and the total
   * (-1 when unknown) as data arrives. A retried attempt starts over from
   * zero and reports `(0, -1)` before its first chunk.
   */
  download(
    url: string,
    destination: string,
    onProgress: TransferProgressCallback,
  ): Promise<void>;
  close(): Promise<void>;
}

export type PackageTransportFactory = () => PackageTransport;

/**
 * Authoritative trust check of a freshly downloaded package file
 */
export type TrustVerifier = (filePath: string) => Promise<boolean>;

// ============================================================================
// Engine
// ============================================================================

export interface SyncEngineOptions {
  transportFactory: PackageTransportFactory;
  verifier: TrustVerifier;
  /** Base URL package links are resolved against */
  packagesBaseUrl: string;
  /** Minimum interval between forwarded per-file ticks in ms (default: 250) */
  progressIntervalMs?: number;
  /** Removes an unreferenced package file (default: unlink) */
  removeOrphan?: (filePath: string) => Promise<void>;
  logger?: MirrorLogger;
}

export interface SyncResult {
  /** Distinct packages referenced by wanted books */
  packagesTotal: number;
  packagesDownloaded: number;
  packagesSkipped: number;
  orphansRemoved: string[];
  indexFilesWritten: string[];
}

// ============================================================================
// Selection
// ============================================================================

export interface BookSummary {
  totalSize: number;
  /** Bytes of packages that are not Ready */
  downloadSize: number;
  packagesOutOfDate: number;
  packagesCached: number;
  packageCount: number;
}
