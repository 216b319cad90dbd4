import { ConflictError, type AssetId } from "@scriptorium/shared";
import type { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import type { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import { VersionId } from "../../domain/value/version-id.js";
import type {
  TranscriptionCommit,
  TranscriptionRepository
} from "../../application/port/transcription-repository.js";

export class InMemoryTranscriptionRepository implements TranscriptionRepository {
  private assets = new Map<string, AssetTranscription>();
  private versions = new Map<string, TranscriptionVersion>();
  private sequence = 0;

  async generateVersionId(): Promise<VersionId> {
    this.sequence += 1;
    return VersionId.create(`v${this.sequence}`);
  }

  async findAsset(assetId: AssetId): Promise<AssetTranscription | null> {
    return this.assets.get(assetId.toString()) ?? null;
  }

  async findVersion(versionId: VersionId): Promise<TranscriptionVersion | null> {
    return this.versions.get(versionId.toString()) ?? null;
  }

  async listByAsset(assetId: AssetId): Promise<TranscriptionVersion[]> {
    return [...this.versions.values()].filter((version) => version.getAssetId().equals(assetId));
  }

  // Check and write happen without yielding, so concurrent commits serialize.
  async commit(commit: TranscriptionCommit): Promise<void> {
    const key = commit.asset.getAssetId().toString();
    const storedRevision = this.assets.get(key)?.getRevision() ?? 0;
    if (storedRevision !== commit.expectedRevision) {
      throw new ConflictError("CONCURRENT_UPDATE", "The transcription changed while you were editing");
    }
    this.assets.set(key, commit.asset);
    for (const version of commit.append) {
      this.versions.set(version.getVersionId().toString(), version);
    }
    if (commit.stamp) {
      this.versions.set(commit.stamp.getVersionId().toString(), commit.stamp);
    }
  }

  /** Test helpers: store records outside the state machine. */
  seedAsset(asset: AssetTranscription): void {
    this.assets.set(asset.getAssetId().toString(), asset);
  }

  seedVersion(version: TranscriptionVersion): void {
    this.versions.set(version.getVersionId().toString(), version);
  }
}
