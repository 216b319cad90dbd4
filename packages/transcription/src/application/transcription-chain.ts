import * as logger from "firebase-functions/logger";
import { AssetId, DomainError, NotFoundError, UserId } from "@scriptorium/shared";
import {
  AssetTranscription,
  type TranscriptionCommand,
  type TranscriptionTransition
} from "../domain/entity/asset-transcription.js";
import { SYSTEM_AUTHOR, TranscriptionVersion } from "../domain/entity/transcription-version.js";
import { VersionId } from "../domain/value/version-id.js";
import type { TranscriptionRepository } from "./port/transcription-repository.js";

export type AppendEntry = {
  author: UserId;
  text: string;
  ocrGenerated?: boolean;
};

export type AppendInput = AppendEntry & { supersedes: VersionId | null };

export type ChainSnapshot = {
  asset: AssetTranscription;
  active: TranscriptionVersion | null;
  undoAvailable: boolean;
  redoAvailable: boolean;
};

export class TranscriptionChain {
  constructor(private readonly repository: TranscriptionRepository) {}

  async load(assetId: AssetId): Promise<AssetTranscription> {
    return (await this.repository.findAsset(assetId)) ?? AssetTranscription.start(assetId);
  }

  async active(assetId: AssetId): Promise<TranscriptionVersion | null> {
    return await this.activeOf(await this.load(assetId));
  }

  async requireVersion(versionId: VersionId): Promise<TranscriptionVersion> {
    const version = await this.repository.findVersion(versionId);
    if (!version) {
      throw new NotFoundError("VERSION_NOT_FOUND", "Transcription not found");
    }
    return version;
  }

  async snapshot(assetId: AssetId): Promise<ChainSnapshot> {
    const asset = await this.load(assetId);
    const active = await this.activeOf(asset);
    return {
      asset,
      active,
      undoAvailable: asset.canUndo(active),
      redoAvailable: asset.canRedo()
    };
  }

  async append(assetId: AssetId, input: AppendInput, now: Date): Promise<TranscriptionVersion> {
    const [version] = await this.appendAll(assetId, input.supersedes, [input], now);
    if (!version) {
      throw new DomainError("CHAIN_CORRUPT", "Save produced no version");
    }
    return version;
  }

  // Each entry supersedes the one before it; all of them land in one commit.
  async appendAll(
    assetId: AssetId,
    supersedes: VersionId | null,
    entries: AppendEntry[],
    now: Date
  ): Promise<TranscriptionVersion[]> {
    const asset = await this.load(assetId);
    let next = asset;
    let active = await this.activeOf(asset);
    let base = supersedes;
    const appended: TranscriptionVersion[] = [];
    for (const entry of entries) {
      const transition = next.apply(
        {
          type: "save",
          versionId: await this.repository.generateVersionId(),
          author: entry.author,
          text: entry.text,
          supersedes: base,
          ocrGenerated: entry.ocrGenerated ?? false,
          active
        },
        now
      );
      if (!transition.append) {
        throw new DomainError("CHAIN_CORRUPT", "Save produced no version");
      }
      appended.push(transition.append);
      next = transition.asset;
      active = transition.append;
      base = transition.append.getVersionId();
    }

    await this.repository.commit({ asset: next, expectedRevision: asset.getRevision(), append: appended });
    for (const version of appended) {
      logger.info("transcription saved", {
        assetId: assetId.toString(),
        versionId: version.getVersionId().toString(),
        author: version.getAuthor().toString()
      });
    }
    return appended;
  }

  async apply(asset: AssetTranscription, command: TranscriptionCommand, now: Date): Promise<AssetTranscription> {
    const transition = asset.apply(command, now);
    await this.commit(asset, transition);
    return transition.asset;
  }

  async undo(assetId: AssetId, now: Date): Promise<AssetTranscription> {
    const asset = await this.load(assetId);
    return await this.apply(asset, { type: "undo", active: await this.activeOf(asset) }, now);
  }

  async redo(assetId: AssetId, now: Date): Promise<AssetTranscription> {
    const asset = await this.load(assetId);
    return await this.apply(asset, { type: "redo", next: await this.nextOnBranch(asset) }, now);
  }

  // Most recent first; each iteration re-reads storage.
  history(assetId: AssetId): AsyncIterable<TranscriptionVersion> {
    const repository = this.repository;
    const load = () => this.load(assetId);
    return {
      async *[Symbol.asyncIterator]() {
        const asset = await load();
        const seen = new Set<string>();
        let cursor = asset.getActiveVersionId();
        while (cursor) {
          const key = cursor.toString();
          if (seen.has(key)) {
            throw new DomainError("CHAIN_CORRUPT", `Version ${key} appears twice in the chain`);
          }
          seen.add(key);
          const version = await repository.findVersion(cursor);
          if (!version) {
            throw new DomainError("CHAIN_CORRUPT", `Version ${key} is missing from the chain`);
          }
          yield version;
          cursor = version.getSupersedes();
        }
      }
    };
  }

  async contributorCount(assetId: AssetId): Promise<number> {
    const versions = await this.repository.listByAsset(assetId);
    const contributors = new Set<string>();
    for (const version of versions) {
      contributors.add(version.getAuthor().toString());
      const reviewer = version.getReviewedBy();
      if (reviewer) {
        contributors.add(reviewer.toString());
      }
    }
    contributors.delete(SYSTEM_AUTHOR.toString());
    return contributors.size;
  }

  private async activeOf(asset: AssetTranscription): Promise<TranscriptionVersion | null> {
    const activeId = asset.getActiveVersionId();
    return activeId ? await this.repository.findVersion(activeId) : null;
  }

  // The version on the head's branch that directly supersedes the active one.
  private async nextOnBranch(asset: AssetTranscription): Promise<TranscriptionVersion | null> {
    const activeId = asset.getActiveVersionId();
    const seen = new Set<string>();
    let cursor = asset.getHeadVersionId();
    while (cursor && activeId && !cursor.equals(activeId)) {
      if (seen.has(cursor.toString())) {
        throw new DomainError("CHAIN_CORRUPT", `Version ${cursor.toString()} appears twice in the chain`);
      }
      seen.add(cursor.toString());
      const version = await this.repository.findVersion(cursor);
      if (!version) {
        return null;
      }
      const previous = version.getSupersedes();
      if (previous && previous.equals(activeId)) {
        return version;
      }
      cursor = previous;
    }
    return null;
  }

  private async commit(asset: AssetTranscription, transition: TranscriptionTransition): Promise<void> {
    await this.repository.commit({
      asset: transition.asset,
      expectedRevision: asset.getRevision(),
      append: transition.append ? [transition.append] : [],
      stamp: transition.stamp
    });
  }
}
