/**
 * Status of the package file currently being transferred.
 * Byte counts are -1 at transfer start and completion, and whenever the
 * transport does not know them.
 */
export interface PackageDownloadStatus {
  filename: string;
  percent: number;
  bytesDownloaded: number;
  bytesToDownload: number;
}

/**
 * Receives the two progress signals of a sync.
 *
 * `onProgress` gets the aggregate percentage once per distinct package.
 * `onDownloadStatus` gets start, tick and completion notifications per file,
 * in that order. Either may be called from any async context; observers that
 * drive a UI schedule their own updates.
 */
export interface SyncObserver {
  onProgress(percent: number): void;
  onDownloadStatus?(status: PackageDownloadStatus): void;
}

export type TransferProgressCallback = (
  bytesReceived: number,
  totalBytes: number,
) => void;
