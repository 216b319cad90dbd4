import * as logger from "firebase-functions/logger";
import type { UserId } from "@scriptorium/shared";
import type { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import type { VersionId } from "../../domain/value/version-id.js";
import type { EditLease } from "../port/edit-lease.js";
import type { TranscriptionChain } from "../transcription-chain.js";

export type SubmitTranscriptionInput = {
  versionId: VersionId;
  actor: UserId;
  now: Date;
};

export class SubmitTranscription {
  constructor(
    private readonly chain: TranscriptionChain,
    private readonly lease: EditLease
  ) {}

  async execute(input: SubmitTranscriptionInput): Promise<AssetTranscription> {
    const version = await this.chain.requireVersion(input.versionId);
    await this.lease.requireLease(version.getAssetId(), input.actor);

    const asset = await this.chain.load(version.getAssetId());
    const next = await this.chain.apply(asset, { type: "submit", actor: input.actor, version }, input.now);
    logger.info("transcription submitted", {
      assetId: version.getAssetId().toString(),
      versionId: input.versionId.toString(),
      actor: input.actor.toString()
    });
    return next;
  }
}
