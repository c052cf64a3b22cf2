/**
 * Package Downloader
 *
 * HTTP transport for package files with retry logic, streamed writes and
 * per-chunk progress reporting.
 */

import { createWriteStream } from "node:fs";
import * as path from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { fetch, type Dispatcher } from "undici";
import {
  FilesystemError,
  MirrorError,
  NetworkError,
  USER_AGENT,
  createDispatcher,
  errnoCode,
  type ProxySettings,
  type TransferProgressCallback,
} from "@helpmirror/catalog-sdk";
import { ensureDir } from "./file-system.js";
import type { PackageTransport } from "../types.js";

export interface PackageDownloaderOptions {
  maxRetries?: number; // Default: 3
  retryDelay?: number; // Default: 1000ms, multiplied by the attempt number
  idleTimeout?: number; // Default: 60000ms without data aborts the attempt
  proxy?: ProxySettings;
  dispatcher?: Dispatcher;
}

const FILESYSTEM_ERRNO_CODES = new Set([
  "EACCES",
  "EPERM",
  "ENOSPC",
  "EROFS",
  "EISDIR",
  "EMFILE",
]);

export class HttpPackageTransport implements PackageTransport {
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly idleTimeout: number;
  private readonly dispatcher: Dispatcher;
  private closed = false;

  constructor(options: PackageDownloaderOptions = {}) {
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelay = options.retryDelay ?? 1000;
    this.idleTimeout = options.idleTimeout ?? 60000;
    this.dispatcher = options.dispatcher ?? createDispatcher(options.proxy);
  }

  async download(
    url: string,
    destination: string,
    onProgress: TransferProgressCallback,
  ): Promise<void> {
    if (this.closed) {
      throw new Error("Package transport is closed");
    }

    let attempt = 0;
    let lastError: unknown = null;

    while (attempt < this.maxRetries) {
      if (attempt > 0) {
        onProgress(0, -1);
      }
      try {
        await this.attemptDownload(url, destination, onProgress);
        return;
      } catch (error) {
        lastError = error;
        attempt++;

        // Client errors and local write failures do not improve on retry
        if (error instanceof FilesystemError) {
          throw error;
        }
        if (
          error instanceof NetworkError &&
          error.status !== undefined &&
          error.status >= 400 &&
          error.status < 500
        ) {
          throw error;
        }

        if (attempt < this.maxRetries) {
          await this.sleep(this.retryDelay * attempt);
        }
      }
    }

    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    throw new NetworkError(
      `Failed to download ${url} after ${this.maxRetries} attempts: ${detail}`,
      url,
      lastError instanceof NetworkError ? lastError.status : undefined,
      lastError,
    );
  }

  /**
   * Single download attempt
   */
  private async attemptDownload(
    url: string,
    destination: string,
    onProgress: TransferProgressCallback,
  ): Promise<void> {
    const controller = new AbortController();
    let idleTimer: NodeJS.Timeout | undefined;
    const armIdleTimer = () => {
      clearTimeout(idleTimer);
      idleTimer = setTimeout(() => controller.abort(), this.idleTimeout);
    };

    armIdleTimer();
    try {
      const response = await fetch(url, {
        dispatcher: this.dispatcher,
        signal: controller.signal,
        headers: { "User-Agent": USER_AGENT },
      });

      if (!response.ok) {
        throw new NetworkError(
          `HTTP ${response.status}: ${response.statusText}`,
          url,
          response.status,
        );
      }
      if (!response.body) {
        throw new NetworkError("Response has no body", url, response.status);
      }

      const lengthHeader = response.headers.get("content-length");
      const parsedLength = lengthHeader ? Number.parseInt(lengthHeader, 10) : Number.NaN;
      const totalBytes = Number.isFinite(parsedLength) ? parsedLength : -1;

      let bytesReceived = 0;
      const counter = new Transform({
        transform(chunk: Buffer, _encoding, callback) {
          armIdleTimer();
          bytesReceived += chunk.length;
          onProgress(bytesReceived, totalBytes);
          callback(null, chunk);
        },
      });

      await this.prepareDestination(destination);
      await pipeline(
        Readable.fromWeb(response.body),
        counter,
        createWriteStream(destination),
      );
    } catch (error) {
      throw this.classify(error, url, destination);
    } finally {
      clearTimeout(idleTimer);
    }
  }

  private async prepareDestination(destination: string): Promise<void> {
    try {
      await ensureDir(path.dirname(destination));
    } catch (error) {
      throw new FilesystemError(
        `Failed to create directory for '${destination}'`,
        destination,
        error,
      );
    }
  }

  private classify(error: unknown, url: string, destination: string): MirrorError {
    if (error instanceof MirrorError) {
      return error;
    }

    const code = errnoCode(error);
    const detail = error instanceof Error ? error.message : String(error);
    if (code && FILESYSTEM_ERRNO_CODES.has(code)) {
      return new FilesystemError(
        `Failed to write '${destination}': ${detail}`,
        destination,
        error,
      );
    }

    return new NetworkError(detail, url, undefined, error);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.dispatcher.close();
  }

  /**
   * Helper to sleep for a specified duration
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
