import type { AssetId, UserId } from "@scriptorium/shared";

/** The slice of the reservation manager that edits depend on. */
export interface EditLease {
  requireLease(assetId: AssetId, holder: UserId): Promise<unknown>;
  releaseAll(assetId: AssetId): Promise<void>;
}
