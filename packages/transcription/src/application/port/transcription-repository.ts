import type { AssetId } from "@scriptorium/shared";
import type { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import type { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import type { VersionId } from "../../domain/value/version-id.js";

export type TranscriptionCommit = {
  asset: AssetTranscription;
  expectedRevision: number;
  append: TranscriptionVersion[];
  stamp?: TranscriptionVersion;
};

export interface TranscriptionRepository {
  generateVersionId(): Promise<VersionId>;
  findAsset(assetId: AssetId): Promise<AssetTranscription | null>;
  findVersion(versionId: VersionId): Promise<TranscriptionVersion | null>;
  /** Every stored version of the asset, unreachable branches included. */
  listByAsset(assetId: AssetId): Promise<TranscriptionVersion[]>;
  /** Atomic; ConflictError CONCURRENT_UPDATE when the stored revision is not `expectedRevision`. */
  commit(commit: TranscriptionCommit): Promise<void>;
}
