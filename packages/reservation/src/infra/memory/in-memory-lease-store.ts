import type { AssetId, UserId } from "@scriptorium/shared";
import { Lease, type LeaseClaim } from "../../domain/lease.js";
import type { LeasePolicy } from "../../domain/lease-policy.js";
import type { LeaseStore } from "../../application/port/lease-store.js";

// Every method reads and writes the map without yielding, so each call is atomic.
export class InMemoryLeaseStore implements LeaseStore {
  private records = new Map<string, Lease>();

  async put(assetId: AssetId, holder: UserId, policy: LeasePolicy, now: Date): Promise<LeaseClaim> {
    const key = assetId.toString();
    const claim = Lease.claim(this.records.get(key) ?? null, assetId, holder, policy, now);
    if (claim.type === "GRANTED") {
      this.records.set(key, claim.lease);
    }
    if (claim.type === "LAPSED") {
      this.records.delete(key);
    }
    return claim;
  }

  async get(assetId: AssetId, now: Date): Promise<Lease | null> {
    const lease = this.records.get(assetId.toString());
    return lease && lease.isLiveAt(now) ? lease : null;
  }

  async find(assetId: AssetId): Promise<Lease | null> {
    return this.records.get(assetId.toString()) ?? null;
  }

  async remove(assetId: AssetId, holder?: UserId): Promise<boolean> {
    const key = assetId.toString();
    const lease = this.records.get(key);
    if (!lease) return false;
    if (holder && !lease.isHeldBy(holder)) return false;
    return this.records.delete(key);
  }

  async reap(assetId: AssetId, holder: UserId, now: Date): Promise<boolean> {
    const key = assetId.toString();
    const lease = this.records.get(key);
    if (!lease || !lease.isHeldBy(holder) || lease.stateAt(now) !== "LAPSED") {
      return false;
    }
    return this.records.delete(key);
  }

  async sweep(now: Date): Promise<number> {
    let removed = 0;
    for (const [key, lease] of this.records) {
      const state = lease.stateAt(now);
      if (state === "LAPSED" || state === "GONE") {
        this.records.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
