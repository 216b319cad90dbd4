import { AssetId, UserId, ValidationError, containsUrl } from "@scriptorium/shared";
import type { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import type { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import type { VersionId } from "../../domain/value/version-id.js";
import type { EditLease } from "../port/edit-lease.js";
import type { TranscriptionChain } from "../transcription-chain.js";

export type SaveTranscriptionInput = {
  assetId: AssetId;
  author: UserId;
  text: string;
  supersedes: VersionId | null;
  now: Date;
};

export type SaveTranscriptionResult = {
  version: TranscriptionVersion;
  asset: AssetTranscription;
  undoAvailable: boolean;
  redoAvailable: boolean;
  contributorCount: number;
};

export class SaveTranscription {
  constructor(
    private readonly chain: TranscriptionChain,
    private readonly lease: EditLease
  ) {}

  async execute(input: SaveTranscriptionInput): Promise<SaveTranscriptionResult> {
    if (containsUrl(input.text)) {
      throw new ValidationError("VALIDATION_ERROR", "validation.transcription.text.url");
    }
    await this.lease.requireLease(input.assetId, input.author);

    const version = await this.chain.append(
      input.assetId,
      { author: input.author, text: input.text, supersedes: input.supersedes },
      input.now
    );
    const snapshot = await this.chain.snapshot(input.assetId);
    return {
      version,
      asset: snapshot.asset,
      undoAvailable: snapshot.undoAvailable,
      redoAvailable: snapshot.redoAvailable,
      contributorCount: await this.chain.contributorCount(input.assetId)
    };
  }
}
