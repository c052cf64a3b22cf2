/**
 * Progress Throttle
 *
 * Transports report progress once per received chunk, which is hundreds of
 * times per second on a fast link. The throttle forwards at most one tick per
 * interval, keeps only the latest pending tick, and lets the caller flush it
 * before the completion notification so per-file ordering is preserved.
 */

import type { PackageDownloadStatus } from "@helpmirror/catalog-sdk";

export type ProgressTickCallback = (status: PackageDownloadStatus) => void;

export interface ProgressThrottleOptions {
  intervalMs?: number; // Minimum time between forwarded ticks (default: 250, 0 forwards all)
}

export class ProgressThrottle {
  private readonly intervalMs: number;
  private pending: PackageDownloadStatus | null = null;
  private lastEmittedAt: number | null = null;
  private timer: NodeJS.Timeout | null = null;
  private destroyed = false;

  constructor(
    private readonly callback: ProgressTickCallback,
    options: ProgressThrottleOptions = {},
  ) {
    this.intervalMs = Math.max(0, options.intervalMs ?? 250);
  }

  /**
   * Record a tick; forwards it now when the interval has elapsed
   */
  update(status: PackageDownloadStatus): void {
    if (this.destroyed) return;

    const now = Date.now();
    if (this.lastEmittedAt === null || now - this.lastEmittedAt >= this.intervalMs) {
      this.clearTimer();
      this.pending = null;
      this.emit(status, now);
      return;
    }

    this.pending = status;
    if (!this.timer) {
      const delay = this.intervalMs - (now - this.lastEmittedAt);
      this.timer = setTimeout(() => {
        this.timer = null;
        this.flush();
      }, delay);
    }
  }

  /**
   * Immediately forward the pending tick, if any
   */
  flush(): void {
    this.clearTimer();
    const status = this.pending;
    this.pending = null;
    if (status) {
      this.emit(status, Date.now());
    }
  }

  /**
   * Flush and stop; no tick is forwarded afterwards
   */
  destroy(): void {
    this.flush();
    this.destroyed = true;
  }

  hasPending(): boolean {
    return this.pending !== null;
  }

  private emit(status: PackageDownloadStatus, at: number): void {
    this.lastEmittedAt = at;
    this.callback(status);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
