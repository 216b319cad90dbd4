import { MIN_LEASE_TTL_MS, ValidationError } from "@scriptorium/shared";

export type LeasePolicy = {
  ttlMs: number;
  maxHoldMs: number;
  tombstoneRetentionMs: number;
};

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_LEASE_POLICY: LeasePolicy = {
  ttlMs: 5 * 60 * 1000,
  maxHoldMs: 12 * HOUR_MS,
  tombstoneRetentionMs: 24 * HOUR_MS
};

export const createLeasePolicy = (input: Partial<LeasePolicy> = {}): LeasePolicy => {
  const policy = { ...DEFAULT_LEASE_POLICY, ...input };
  if (!Number.isFinite(policy.ttlMs) || policy.ttlMs < MIN_LEASE_TTL_MS) {
    throw new ValidationError(
      "LEASE_TTL_TOO_SHORT",
      `Lease TTL must be at least ${MIN_LEASE_TTL_MS}ms`
    );
  }
  if (!Number.isFinite(policy.maxHoldMs) || policy.maxHoldMs <= policy.ttlMs) {
    throw new ValidationError("LEASE_MAX_HOLD_INVALID", "Max hold must exceed the lease TTL");
  }
  if (!Number.isFinite(policy.tombstoneRetentionMs) || policy.tombstoneRetentionMs < 0) {
    throw new ValidationError("LEASE_TOMBSTONE_INVALID", "Tombstone retention must not be negative");
  }
  return policy;
};
