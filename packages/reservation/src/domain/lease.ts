import { AssetId, UserId, addMilliseconds, laterOf } from "@scriptorium/shared";
import type { LeasePolicy } from "./lease-policy.js";

/** TOMBSTONED: held past the hold limit; others may take it, the holder may not until `tombstoneUntil`. */
export type LeaseState = "LIVE" | "LAPSED" | "TOMBSTONED" | "GONE";

export type LeaseProps = {
  assetId: AssetId;
  holder: UserId;
  acquiredAt: Date;
  renewedAt: Date;
  expiresAt: Date;
  holdLimitAt: Date;
  tombstoneUntil: Date;
};

export type LeaseClaim =
  | { type: "GRANTED"; lease: Lease; renewed: boolean }
  | { type: "HELD"; lease: Lease }
  | { type: "LAPSED"; lease: Lease }
  | { type: "TOMBSTONED"; lease: Lease };

export class Lease {
  private constructor(private readonly props: LeaseProps) {}

  static acquire(assetId: AssetId, holder: UserId, policy: LeasePolicy, now: Date): Lease {
    const holdLimitAt = addMilliseconds(now, policy.maxHoldMs);
    return new Lease({
      assetId,
      holder,
      acquiredAt: now,
      renewedAt: now,
      expiresAt: addMilliseconds(now, policy.ttlMs),
      holdLimitAt,
      tombstoneUntil: addMilliseconds(holdLimitAt, policy.tombstoneRetentionMs)
    });
  }

  static reconstruct(props: LeaseProps): Lease {
    return new Lease({ ...props });
  }

  /** Run by stores inside their atomic section. */
  static claim(
    current: Lease | null,
    assetId: AssetId,
    holder: UserId,
    policy: LeasePolicy,
    now: Date
  ): LeaseClaim {
    const state = current ? current.stateAt(now) : "GONE";
    if (!current || state === "GONE") {
      return { type: "GRANTED", lease: Lease.acquire(assetId, holder, policy, now), renewed: false };
    }
    if (!current.isHeldBy(holder)) {
      if (state === "LIVE") {
        return { type: "HELD", lease: current };
      }
      return { type: "GRANTED", lease: Lease.acquire(assetId, holder, policy, now), renewed: false };
    }
    if (state === "LAPSED") {
      return { type: "LAPSED", lease: current };
    }
    if (state === "TOMBSTONED") {
      return { type: "TOMBSTONED", lease: current };
    }
    return { type: "GRANTED", lease: current.renew(policy, now), renewed: true };
  }

  stateAt(now: Date): LeaseState {
    const t = now.getTime();
    const holdLimit = this.props.holdLimitAt.getTime();
    if (holdLimit <= this.props.expiresAt.getTime() && holdLimit <= t) {
      return t < this.props.tombstoneUntil.getTime() ? "TOMBSTONED" : "GONE";
    }
    if (t >= this.props.expiresAt.getTime()) {
      return "LAPSED";
    }
    return "LIVE";
  }

  isLiveAt(now: Date): boolean {
    return this.stateAt(now) === "LIVE";
  }

  isHeldBy(holder: UserId): boolean {
    return this.props.holder.equals(holder);
  }

  // Renewal only ever moves expiry forward.
  renew(policy: LeasePolicy, now: Date): Lease {
    return new Lease({
      ...this.props,
      renewedAt: now,
      expiresAt: laterOf(this.props.expiresAt, addMilliseconds(now, policy.ttlMs))
    });
  }

  getAssetId(): AssetId {
    return this.props.assetId;
  }

  getHolder(): UserId {
    return this.props.holder;
  }

  getAcquiredAt(): Date {
    return this.props.acquiredAt;
  }

  getRenewedAt(): Date {
    return this.props.renewedAt;
  }

  getExpiresAt(): Date {
    return this.props.expiresAt;
  }

  getHoldLimitAt(): Date {
    return this.props.holdLimitAt;
  }

  getTombstoneUntil(): Date {
    return this.props.tombstoneUntil;
  }
}
