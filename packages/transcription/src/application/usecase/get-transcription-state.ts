import type { AssetId } from "@scriptorium/shared";
import type { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import type { TranscriptionChain } from "../transcription-chain.js";
import type { TranscriptionStatus } from "../../domain/value/transcription-status.js";

export type TranscriptionState = {
  assetId: AssetId;
  status: TranscriptionStatus;
  active: TranscriptionVersion | null;
  undoAvailable: boolean;
  redoAvailable: boolean;
  contributorCount: number;
};

export class GetTranscriptionState {
  constructor(private readonly chain: TranscriptionChain) {}

  async execute(assetId: AssetId): Promise<TranscriptionState> {
    const snapshot = await this.chain.snapshot(assetId);
    return {
      assetId,
      status: snapshot.asset.getStatus(),
      active: snapshot.active,
      undoAvailable: snapshot.undoAvailable,
      redoAvailable: snapshot.redoAvailable,
      contributorCount: await this.chain.contributorCount(assetId)
    };
  }
}
