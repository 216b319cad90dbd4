import { KEEP_ALIVE_INTERVAL_MS } from "@scriptorium/shared";
import type { ReserveConflict, ReserveGranted, ReserveResult } from "./api.js";

export type KeepAliveOptions = {
  api: { reserve: (assetId: string) => Promise<ReserveResult> };
  assetId: string;
  intervalMs?: number;
  onGranted?: (result: ReserveGranted) => void;
  /** Someone else holds the page; the loop has stopped. */
  onConflict?: (result: ReserveConflict) => void;
  /** The caller's own lease lapsed; a re-acquire follows immediately. */
  onExpired?: () => void;
  onTransientError?: (error: unknown) => void;
};

/** Attempts never overlap: the next one is scheduled after the previous settles. */
export class KeepAliveLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;
  private readonly intervalMs: number;

  constructor(private readonly options: KeepAliveOptions) {
    this.intervalMs = options.intervalMs ?? KEEP_ALIVE_INTERVAL_MS;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    void this.tick();
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  private schedule(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, this.intervalMs);
  }

  private async tick(): Promise<void> {
    try {
      const result = await this.options.api.reserve(this.options.assetId);
      if (!this.running) return;
      if (result.type === "EXPIRED") {
        this.options.onExpired?.();
        await this.reacquire();
      } else {
        this.handle(result);
      }
    } catch (error) {
      if (!this.running) return;
      this.options.onTransientError?.(error);
    }
    this.schedule();
  }

  private async reacquire(): Promise<void> {
    const retry = await this.options.api.reserve(this.options.assetId);
    if (!this.running) return;
    // Two lapses in a row count as a loss.
    this.handle(retry.type === "EXPIRED" ? { type: "CONFLICT", code: "LEASE_EXPIRED" } : retry);
  }

  private handle(result: ReserveGranted | ReserveConflict): void {
    if (result.type === "GRANTED") {
      this.options.onGranted?.(result);
      return;
    }
    this.stop();
    this.options.onConflict?.(result);
  }
}
