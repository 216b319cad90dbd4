import { AssetId, DomainError, UserId, coerceDate } from "@scriptorium/shared";
import { Lease } from "../../domain/lease.js";

export type LeaseDocument = {
  assetId: string;
  holder: string;
  acquiredAt: Date;
  renewedAt: Date;
  expiresAt: Date;
  holdLimitAt: Date;
  tombstoneUntil: Date;
};

const requireDate = (data: Record<string, unknown>, field: keyof LeaseDocument): Date => {
  const value = coerceDate(data[field]);
  if (!value) {
    throw new DomainError("LEASE_RECORD_INVALID", `Lease record has no valid ${field}`);
  }
  return value;
};

export const mapLeaseFromFirestore = (data: Record<string, unknown>, fallbackId: string): Lease => {
  const storedId = data.assetId;
  const assetId = typeof storedId === "string" ? storedId : fallbackId;
  const holder = data.holder;
  if (typeof holder !== "string") {
    throw new DomainError("LEASE_RECORD_INVALID", "Lease record has no holder");
  }
  return Lease.reconstruct({
    assetId: AssetId.create(assetId),
    holder: UserId.create(holder),
    acquiredAt: requireDate(data, "acquiredAt"),
    renewedAt: requireDate(data, "renewedAt"),
    expiresAt: requireDate(data, "expiresAt"),
    holdLimitAt: requireDate(data, "holdLimitAt"),
    tombstoneUntil: requireDate(data, "tombstoneUntil")
  });
};

export const mapLeaseToFirestore = (lease: Lease): LeaseDocument => ({
  assetId: lease.getAssetId().toString(),
  holder: lease.getHolder().toString(),
  acquiredAt: lease.getAcquiredAt(),
  renewedAt: lease.getRenewedAt(),
  expiresAt: lease.getExpiresAt(),
  holdLimitAt: lease.getHoldLimitAt(),
  tombstoneUntil: lease.getTombstoneUntil()
});
