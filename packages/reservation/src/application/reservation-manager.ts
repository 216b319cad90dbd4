import * as logger from "firebase-functions/logger";
import {
  AssetId,
  AuthorizationError,
  ConflictError,
  LeaseExpiredError,
  UserId
} from "@scriptorium/shared";
import type { Lease, LeaseClaim } from "../domain/lease.js";
import type { LeasePolicy } from "../domain/lease-policy.js";
import type { ReservationOutcome } from "../domain/reservation-outcome.js";
import type { LeaseStore } from "./port/lease-store.js";

const logContext = (assetId: AssetId, holder: UserId) => ({
  assetId: assetId.toString(),
  holder: holder.toString()
});

export class ReservationManager {
  constructor(
    private readonly store: LeaseStore,
    private readonly policy: LeasePolicy,
    private readonly now: () => Date = () => new Date()
  ) {}

  /** Fails closed. */
  async reserve(assetId: AssetId, holder: UserId): Promise<ReservationOutcome> {
    let claim: LeaseClaim;
    try {
      claim = await this.store.put(assetId, holder, this.policy, this.now());
    } catch (error) {
      logger.error("lease store unavailable, refusing reservation", {
        ...logContext(assetId, holder),
        error: error instanceof Error ? error.message : String(error)
      });
      return { type: "CONFLICT", reason: "UNAVAILABLE" };
    }

    switch (claim.type) {
      case "GRANTED":
        logger.debug(claim.renewed ? "lease renewed" : "lease granted", {
          ...logContext(assetId, holder),
          expiresAt: claim.lease.getExpiresAt().toISOString()
        });
        return { type: "GRANTED", lease: claim.lease, renewed: claim.renewed };
      case "HELD":
        logger.info("lease held by another editor", {
          ...logContext(assetId, holder),
          heldBy: claim.lease.getHolder().toString()
        });
        return { type: "CONFLICT", reason: "HELD", heldUntil: claim.lease.getExpiresAt() };
      case "LAPSED":
        logger.info("lease lapsed before renewal", logContext(assetId, holder));
        return { type: "EXPIRED", reason: "LAPSED" };
      case "TOMBSTONED":
        logger.info("lease tombstoned after max hold", logContext(assetId, holder));
        return { type: "EXPIRED", reason: "TOMBSTONED" };
    }
  }

  /** Idempotent: a caller that does not own the lease changes nothing. */
  async release(assetId: AssetId, holder: UserId): Promise<boolean> {
    const released = await this.store.remove(assetId, holder);
    if (released) {
      logger.info("lease released", logContext(assetId, holder));
    }
    return released;
  }

  async releaseAll(assetId: AssetId): Promise<void> {
    await this.store.remove(assetId);
  }

  async current(assetId: AssetId): Promise<Lease | null> {
    return await this.store.get(assetId, this.now());
  }

  /** A lapse is reported once; the record is reaped so the next reserve grants. */
  async requireLease(assetId: AssetId, holder: UserId): Promise<Lease> {
    const now = this.now();
    let lease: Lease | null;
    try {
      lease = await this.store.find(assetId);
    } catch (error) {
      logger.error("lease store unavailable, refusing edit", {
        ...logContext(assetId, holder),
        error: error instanceof Error ? error.message : String(error)
      });
      throw new ConflictError("LEASE_STORE_UNAVAILABLE", "Reservation could not be verified");
    }

    const state = lease ? lease.stateAt(now) : "GONE";
    if (!lease || state === "GONE") {
      throw new AuthorizationError("LEASE_REQUIRED", "Reserve this asset before editing");
    }
    if (!lease.isHeldBy(holder)) {
      if (state === "LIVE") {
        throw new ConflictError("LEASE_HELD", "Someone else is working on this asset");
      }
      throw new AuthorizationError("LEASE_REQUIRED", "Reserve this asset before editing");
    }
    if (state === "LAPSED") {
      await this.reapLapsed(assetId, holder, now);
      throw new LeaseExpiredError("LEASE_EXPIRED", "Your reservation expired");
    }
    if (state === "TOMBSTONED") {
      throw new LeaseExpiredError("LEASE_EXPIRED", "Your reservation expired");
    }
    return lease;
  }

  // Best effort: an unreaped lapse is reported again on the next call.
  private async reapLapsed(assetId: AssetId, holder: UserId, now: Date): Promise<void> {
    try {
      await this.store.reap(assetId, holder, now);
    } catch (error) {
      logger.warn("lapsed lease could not be reaped", {
        ...logContext(assetId, holder),
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
