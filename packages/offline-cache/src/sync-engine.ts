/**
 * Sync Engine
 *
 * Brings a cache directory in line with the wanted books of a catalog:
 * regenerates the index files, prunes packages no wanted book references,
 * and downloads missing or stale packages one at a time.
 *
 * Every step is a commit point. A failure aborts the remaining steps and
 * leaves what was already written on disk.
 */

import * as path from "node:path";
import {
  InvalidArgumentError,
  IntegrityError,
  MirrorError,
  NetworkError,
  PackageState,
  SyncInProgressError,
  createLogger,
  type BookGroup,
  type MirrorLogger,
  type Package,
  type PackageDownloadStatus,
  type SyncObserver,
} from "@helpmirror/catalog-sdk";
import {
  isIndexFileName,
  packageFileName,
  renderBookIndex,
  renderGroupIndex,
  renderSetupIndex,
} from "@helpmirror/help-index";
import {
  deleteFile,
  ensureDir,
  listFiles,
  setFileTimes,
  withFilesystemError,
  writeTextWithBom,
} from "./utils/file-system.js";
import {
  buildBookIndexPath,
  buildCachePaths,
  buildGroupIndexPath,
  packageKey,
} from "./utils/paths.js";
import { ProgressThrottle } from "./utils/progress-throttle.js";
import type {
  PackageTransport,
  SyncEngineOptions,
  SyncResult,
} from "./types.js";

export class SyncEngine {
  private readonly logger: MirrorLogger;
  private readonly progressIntervalMs: number;
  private readonly removeOrphan: (filePath: string) => Promise<void>;
  private activeSync: string | null = null;

  constructor(private readonly options: SyncEngineOptions) {
    this.logger = options.logger ?? createLogger("sync-engine");
    this.progressIntervalMs = options.progressIntervalMs ?? 250;
    this.removeOrphan = options.removeOrphan ?? deleteFile;
  }

  /**
   * Downloads the packages of every wanted book into `cacheDirectory` and
   * writes the index files the help viewer reads.
   *
   * @throws InvalidArgumentError when an argument is missing
   * @throws FilesystemError when the cache directory cannot be written
   * @throws NetworkError when a package download fails
   * @throws IntegrityError when a downloaded package fails verification
   * @throws SyncInProgressError when this engine is already syncing
   */
  async syncBooks(
    bookGroups: readonly BookGroup[],
    cacheDirectory: string,
    observer: SyncObserver,
  ): Promise<SyncResult> {
    if (this.activeSync !== null) {
      throw new SyncInProgressError(this.activeSync);
    }
    if (!bookGroups) {
      throw new InvalidArgumentError("bookGroups");
    }
    if (!cacheDirectory) {
      throw new InvalidArgumentError("cacheDirectory");
    }
    if (!observer) {
      throw new InvalidArgumentError("observer");
    }

    this.activeSync = cacheDirectory;
    try {
      return await this.runSync(bookGroups, cacheDirectory, observer);
    } finally {
      this.activeSync = null;
    }
  }

  isSyncing(): boolean {
    return this.activeSync !== null;
  }

  private async runSync(
    bookGroups: readonly BookGroup[],
    cacheDirectory: string,
    observer: SyncObserver,
  ): Promise<SyncResult> {
    const paths = buildCachePaths(cacheDirectory);

    await withFilesystemError(paths.packagesDir, "create directory", () =>
      ensureDir(paths.packagesDir),
    );

    await this.removeIndexFiles(cacheDirectory);

    const indexFilesWritten: string[] = [];
    const writeIndex = async (filePath: string, content: string) => {
      await withFilesystemError(filePath, "write index file", () =>
        writeTextWithBom(filePath, content),
      );
      indexFilesWritten.push(path.basename(filePath));
    };

    await writeIndex(paths.setupIndexFile, renderSetupIndex(bookGroups));

    const packages = new Map<string, Package>();
    for (const bookGroup of bookGroups) {
      await writeIndex(
        buildGroupIndexPath(cacheDirectory, bookGroup),
        renderGroupIndex(bookGroup),
      );
      this.logger.debug("Book group indexed", { bookGroup: bookGroup.name });

      for (const book of bookGroup.books) {
        if (!book.wanted) continue;

        await writeIndex(
          buildBookIndexPath(cacheDirectory, book),
          renderBookIndex(bookGroup, book),
        );
        this.logger.debug("Book indexed", { book: book.name });

        for (const pkg of book.packages) {
          const key = packageKey(pkg);
          if (!packages.has(key)) {
            packages.set(key, pkg);
          }
        }
      }
    }

    const orphansRemoved = await this.removeOrphans(paths.packagesDir, packages);

    let packagesDownloaded = 0;
    let packagesSkipped = 0;
    let packagesProcessed = 0;
    const total = packages.size;

    const transport = this.options.transportFactory();
    try {
      for (const pkg of packages.values()) {
        if (
          pkg.state === PackageState.NotDownloaded ||
          pkg.state === PackageState.OutOfDate
        ) {
          await this.downloadPackage(transport, pkg, paths.packagesDir, observer);
          packagesDownloaded++;
        } else {
          packagesSkipped++;
        }

        packagesProcessed++;
        this.reportProgress(observer, Math.round((100 * packagesProcessed) / total));
      }
    } finally {
      await this.closeTransport(transport);
    }

    this.logger.info("Sync completed", {
      cacheDirectory,
      packagesTotal: total,
      packagesDownloaded,
      packagesSkipped,
      orphansRemoved: orphansRemoved.length,
    });

    return {
      packagesTotal: total,
      packagesDownloaded,
      packagesSkipped,
      orphansRemoved,
      indexFilesWritten,
    };
  }

  /**
   * Deletes the previously generated top-level index files
   */
  private async removeIndexFiles(cacheDirectory: string): Promise<void> {
    const files = await withFilesystemError(cacheDirectory, "list", () =>
      listFiles(cacheDirectory),
    );

    for (const fileName of files.filter(isIndexFileName)) {
      const filePath = path.join(cacheDirectory, fileName);
      await withFilesystemError(filePath, "delete index file", () =>
        deleteFile(filePath),
      );
    }
  }

  /**
   * Deletes package files no wanted book references. Best effort: a file that
   * cannot be deleted is logged and left in place.
   */
  private async removeOrphans(
    packagesDir: string,
    packages: ReadonlyMap<string, Package>,
  ): Promise<string[]> {
    const keep = new Set(
      Array.from(packages.values(), (pkg) => packageFileName(pkg).toUpperCase()),
    );

    const files = await withFilesystemError(packagesDir, "list", () =>
      listFiles(packagesDir),
    );

    const removed: string[] = [];
    for (const fileName of files) {
      if (keep.has(fileName.toUpperCase())) continue;

      const filePath = path.join(packagesDir, fileName);
      try {
        await this.removeOrphan(filePath);
        removed.push(fileName);
        this.logger.debug("Removed unreferenced package", { file: fileName });
      } catch (error) {
        this.logger.warn("Failed to remove unreferenced package", {
          file: filePath,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return removed;
  }

  private async downloadPackage(
    transport: PackageTransport,
    pkg: Package,
    packagesDir: string,
    observer: SyncObserver,
  ): Promise<void> {
    const filename = packageFileName(pkg);
    const target = path.join(packagesDir, filename);
    const url = this.resolvePackageUrl(pkg.link);

    this.logger.debug("Downloading package", { link: url, target });
    this.reportStatus(observer, {
      filename,
      percent: 0,
      bytesDownloaded: -1,
      bytesToDownload: -1,
    });

    const throttle = new ProgressThrottle(
      (status) => this.reportStatus(observer, status),
      { intervalMs: this.progressIntervalMs },
    );

    try {
      await transport.download(url, target, (bytesReceived, totalBytes) => {
        throttle.update({
          filename,
          percent:
            totalBytes > 0
              ? Math.min(100, Math.floor((bytesReceived * 100) / totalBytes))
              : 0,
          bytesDownloaded: bytesReceived,
          bytesToDownload: totalBytes,
        });
      });
    } catch (error) {
      if (error instanceof MirrorError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Failed to download ${url}: ${detail}`, url, undefined, error);
    } finally {
      throttle.destroy();
    }

    this.reportStatus(observer, {
      filename,
      percent: 100,
      bytesDownloaded: -1,
      bytesToDownload: -1,
    });

    if (!(await this.options.verifier(target))) {
      this.logger.warn("Package signature is not valid - deleting", { target });
      await withFilesystemError(target, "delete", () => deleteFile(target));
      throw new IntegrityError(target);
    }

    await withFilesystemError(target, "set timestamps on", () =>
      setFileTimes(target, pkg.lastModified),
    );
    pkg.state = PackageState.Ready;
  }

  private resolvePackageUrl(link: string): string {
    try {
      return new URL(link, this.options.packagesBaseUrl).toString();
    } catch (error) {
      throw new NetworkError(`Invalid package link '${link}'`, link, undefined, error);
    }
  }

  private reportProgress(observer: SyncObserver, percent: number): void {
    try {
      observer.onProgress(percent);
    } catch (error) {
      this.logger.error("Error in sync progress observer", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private reportStatus(observer: SyncObserver, status: PackageDownloadStatus): void {
    try {
      observer.onDownloadStatus?.(status);
    } catch (error) {
      this.logger.error("Error in download status observer", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async closeTransport(transport: PackageTransport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      this.logger.warn("Failed to close package transport", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
