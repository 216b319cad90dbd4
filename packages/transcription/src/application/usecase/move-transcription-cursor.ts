import * as logger from "firebase-functions/logger";
import { DomainError, type AssetId, type UserId } from "@scriptorium/shared";
import type { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import type { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import type { EditLease } from "../port/edit-lease.js";
import type { TranscriptionChain } from "../transcription-chain.js";

export type MoveCursorInput = {
  assetId: AssetId;
  actor: UserId;
  now: Date;
};

export type MoveCursorResult = {
  version: TranscriptionVersion;
  asset: AssetTranscription;
  undoAvailable: boolean;
  redoAvailable: boolean;
};

const moveCursor = async (
  chain: TranscriptionChain,
  lease: EditLease,
  direction: "undo" | "redo",
  input: MoveCursorInput
): Promise<MoveCursorResult> => {
  await lease.requireLease(input.assetId, input.actor);
  if (direction === "undo") {
    await chain.undo(input.assetId, input.now);
  } else {
    await chain.redo(input.assetId, input.now);
  }

  const snapshot = await chain.snapshot(input.assetId);
  if (!snapshot.active) {
    throw new DomainError("CHAIN_CORRUPT", "Active version is missing after moving the cursor");
  }
  logger.info(direction === "undo" ? "transcription rolled back" : "transcription rolled forward", {
    assetId: input.assetId.toString(),
    versionId: snapshot.active.getVersionId().toString(),
    actor: input.actor.toString()
  });
  return {
    version: snapshot.active,
    asset: snapshot.asset,
    undoAvailable: snapshot.undoAvailable,
    redoAvailable: snapshot.redoAvailable
  };
};

export class RollbackTranscription {
  constructor(
    private readonly chain: TranscriptionChain,
    private readonly lease: EditLease
  ) {}

  async execute(input: MoveCursorInput): Promise<MoveCursorResult> {
    return await moveCursor(this.chain, this.lease, "undo", input);
  }
}

export class RollforwardTranscription {
  constructor(
    private readonly chain: TranscriptionChain,
    private readonly lease: EditLease
  ) {}

  async execute(input: MoveCursorInput): Promise<MoveCursorResult> {
    return await moveCursor(this.chain, this.lease, "redo", input);
  }
}
