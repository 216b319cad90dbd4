import type { AssetId, UserId } from "@scriptorium/shared";
import type { Lease, LeaseClaim } from "../../domain/lease.js";
import type { LeasePolicy } from "../../domain/lease-policy.js";

/** One record per asset; expiry is read from the record, never from `sweep`. */
export interface LeaseStore {
  /** Atomic compare-and-set around {@link Lease.claim}. */
  put(assetId: AssetId, holder: UserId, policy: LeasePolicy, now: Date): Promise<LeaseClaim>;
  /** The live lease, or null when the record is absent or no longer live. */
  get(assetId: AssetId, now: Date): Promise<Lease | null>;
  find(assetId: AssetId): Promise<Lease | null>;
  remove(assetId: AssetId, holder?: UserId): Promise<boolean>;
  /** Removes the holder's record only if it is LAPSED at `now`. */
  reap(assetId: AssetId, holder: UserId, now: Date): Promise<boolean>;
  /** Deletes LAPSED and GONE records; returns how many went. */
  sweep(now: Date): Promise<number>;
}
