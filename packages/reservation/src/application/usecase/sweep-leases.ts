import * as logger from "firebase-functions/logger";
import type { LeaseStore } from "../port/lease-store.js";

/** Garbage collection only; lease state never depends on this having run. */
export class SweepLeases {
  constructor(private readonly store: LeaseStore) {}

  async execute(now: Date): Promise<number> {
    const removed = await this.store.sweep(now);
    if (removed > 0) {
      logger.info("lease sweep removed records", { removed });
    }
    return removed;
  }
}
