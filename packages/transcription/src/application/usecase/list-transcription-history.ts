import type { AssetId } from "@scriptorium/shared";
import type { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import type { TranscriptionChain } from "../transcription-chain.js";

export class ListTranscriptionHistory {
  constructor(private readonly chain: TranscriptionChain) {}

  async execute(assetId: AssetId, limit?: number): Promise<TranscriptionVersion[]> {
    const versions: TranscriptionVersion[] = [];
    for await (const version of this.chain.history(assetId)) {
      if (limit !== undefined && versions.length >= limit) break;
      versions.push(version);
    }
    return versions;
  }
}
