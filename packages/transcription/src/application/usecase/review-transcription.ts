import * as logger from "firebase-functions/logger";
import { RateLimitedError, type AssetId, type UserId } from "@scriptorium/shared";
import type { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import type { VersionId } from "../../domain/value/version-id.js";
import type { EditLease } from "../port/edit-lease.js";
import type { RateLimiter } from "../port/rate-limiter.js";
import type { TranscriptionChain } from "../transcription-chain.js";

export type ReviewAction = "accept" | "reject";

export type ReviewTranscriptionInput = {
  versionId: VersionId;
  reviewer: UserId;
  action: ReviewAction;
  now: Date;
};

/** `acceptLimit` accepts per reviewer inside `windowMs`; 0 turns the limit off. */
export type ReviewSettings = {
  acceptLimit: number;
  windowMs: number;
};

/** Reviewers need no lease. Accepting closes the asset and frees its lease. */
export class ReviewTranscription {
  constructor(
    private readonly chain: TranscriptionChain,
    private readonly lease: EditLease,
    private readonly rateLimiter: RateLimiter,
    private readonly settings: ReviewSettings
  ) {}

  async execute(input: ReviewTranscriptionInput): Promise<AssetTranscription> {
    const version = await this.chain.requireVersion(input.versionId);
    const asset = await this.chain.load(version.getAssetId());
    const command = { type: input.action, reviewer: input.reviewer, version };
    // Guards run first so a refused review is not charged to the limit.
    asset.apply(command, input.now);
    if (input.action === "accept") {
      await this.checkAcceptLimit(input.reviewer, input.now);
    }
    const next = await this.chain.apply(asset, command, input.now);
    if (input.action === "accept") {
      await this.releaseLeases(version.getAssetId());
    }
    logger.info("transcription reviewed", {
      assetId: version.getAssetId().toString(),
      versionId: input.versionId.toString(),
      reviewer: input.reviewer.toString(),
      action: input.action
    });
    return next;
  }

  private async checkAcceptLimit(reviewer: UserId, now: Date): Promise<void> {
    if (this.settings.acceptLimit <= 0) return;
    const retryAfterSeconds = await this.rateLimiter.attempt(
      `review:${reviewer.toString()}`,
      { windowMs: this.settings.windowMs, maxCalls: this.settings.acceptLimit },
      now
    );
    if (retryAfterSeconds > 0) {
      logger.warn("review rate limited", { reviewer: reviewer.toString(), retryAfterSeconds });
      throw new RateLimitedError(
        "RATE_LIMITED",
        "Too many reviews accepted in a short time, try again later",
        retryAfterSeconds
      );
    }
  }

  // The accept is already committed; a lease left behind expires on its own.
  private async releaseLeases(assetId: AssetId): Promise<void> {
    try {
      await this.lease.releaseAll(assetId);
    } catch (error) {
      logger.warn("lease release after accept failed", {
        assetId: assetId.toString(),
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
