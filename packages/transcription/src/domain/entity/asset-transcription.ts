import {
  AssetId,
  AuthorizationError,
  ConflictError,
  DomainError,
  UserId,
  ValidationError
} from "@scriptorium/shared";
import { VersionId, sameVersion } from "../value/version-id.js";
import { isEditableStatus, type TranscriptionStatus } from "../value/transcription-status.js";
import { TranscriptionVersion } from "./transcription-version.js";

export type AssetTranscriptionProps = {
  assetId: AssetId;
  status: TranscriptionStatus;
  activeVersionId: VersionId | null;
  headVersionId: VersionId | null;
  revision: number;
  updatedAt: Date | null;
};

export type TranscriptionCommand =
  | {
      type: "save";
      versionId: VersionId;
      author: UserId;
      text: string;
      supersedes: VersionId | null;
      ocrGenerated: boolean;
      active: TranscriptionVersion | null;
    }
  | { type: "submit"; actor: UserId; version: TranscriptionVersion }
  | { type: "accept"; reviewer: UserId; version: TranscriptionVersion }
  | { type: "reject"; reviewer: UserId; version: TranscriptionVersion }
  | { type: "undo"; active: TranscriptionVersion | null }
  | { type: "redo"; next: TranscriptionVersion | null };

export type TranscriptionTransition = {
  asset: AssetTranscription;
  append?: TranscriptionVersion;
  stamp?: TranscriptionVersion;
};

/** `headVersionId` is the tip redo walks toward; `revision` is the compare-and-set token. */
export class AssetTranscription {
  private constructor(private readonly props: AssetTranscriptionProps) {}

  static start(assetId: AssetId): AssetTranscription {
    return new AssetTranscription({
      assetId,
      status: "not_started",
      activeVersionId: null,
      headVersionId: null,
      revision: 0,
      updatedAt: null
    });
  }

  static reconstruct(props: AssetTranscriptionProps): AssetTranscription {
    return new AssetTranscription({ ...props });
  }

  apply(command: TranscriptionCommand, now: Date): TranscriptionTransition {
    switch (command.type) {
      case "save":
        return this.save(command, now);
      case "submit":
        return this.submit(command.actor, command.version, now);
      case "accept":
      case "reject":
        return this.review(command.type, command.reviewer, command.version, now);
      case "undo":
        return this.undo(command.active, now);
      case "redo":
        return this.redo(command.next, now);
    }
  }

  isEditable(): boolean {
    return isEditableStatus(this.props.status);
  }

  canUndo(active: TranscriptionVersion | null): boolean {
    return this.isEditable() && active !== null && active.getSupersedes() !== null;
  }

  canRedo(): boolean {
    return this.isEditable() && !sameVersion(this.props.activeVersionId, this.props.headVersionId);
  }

  getAssetId(): AssetId {
    return this.props.assetId;
  }

  getStatus(): TranscriptionStatus {
    return this.props.status;
  }

  getActiveVersionId(): VersionId | null {
    return this.props.activeVersionId;
  }

  getHeadVersionId(): VersionId | null {
    return this.props.headVersionId;
  }

  getRevision(): number {
    return this.props.revision;
  }

  getUpdatedAt(): Date | null {
    return this.props.updatedAt;
  }

  private next(changes: Partial<AssetTranscriptionProps>, now: Date): AssetTranscription {
    return new AssetTranscription({
      ...this.props,
      ...changes,
      revision: this.props.revision + 1,
      updatedAt: now
    });
  }

  private requireEditable(): void {
    if (!this.isEditable()) {
      throw new ConflictError(
        "INVALID_TRANSITION",
        `Transcription is ${this.props.status} and cannot be edited`
      );
    }
  }

  private requireActive(version: TranscriptionVersion): void {
    if (!sameVersion(version.getVersionId(), this.props.activeVersionId)) {
      throw new ConflictError("VERSION_SUPERSEDED", "This transcription has been superseded");
    }
  }

  private save(command: Extract<TranscriptionCommand, { type: "save" }>, now: Date): TranscriptionTransition {
    this.requireEditable();
    if (!sameVersion(command.supersedes, this.props.activeVersionId)) {
      throw new ConflictError("VERSION_SUPERSEDED", "This transcription has been superseded");
    }
    const version = TranscriptionVersion.create({
      versionId: command.versionId,
      assetId: this.props.assetId,
      text: command.text,
      author: command.author,
      supersedes: command.supersedes,
      ocrGenerated: command.ocrGenerated,
      ocrOriginated: !command.ocrGenerated && (command.active?.isOcrDerived() ?? false),
      now
    });
    // Saving after an undo starts a new branch.
    return {
      asset: this.next(
        { status: "in_progress", activeVersionId: version.getVersionId(), headVersionId: version.getVersionId() },
        now
      ),
      append: version
    };
  }

  private submit(actor: UserId, version: TranscriptionVersion, now: Date): TranscriptionTransition {
    if (this.props.status !== "in_progress") {
      throw new ConflictError(
        "INVALID_TRANSITION",
        `Transcription is ${this.props.status} and cannot be submitted`
      );
    }
    this.requireActive(version);
    if (!version.isAuthoredBy(actor)) {
      throw new AuthorizationError("NOT_AUTHOR", "Only the author can submit this transcription");
    }
    if (version.isSubmitted()) {
      throw new ConflictError("VERSION_ALREADY_SUBMITTED", "This transcription was already submitted");
    }
    return {
      asset: this.next({ status: "submitted" }, now),
      stamp: version.markSubmitted(now)
    };
  }

  private review(
    action: "accept" | "reject",
    reviewer: UserId,
    version: TranscriptionVersion,
    now: Date
  ): TranscriptionTransition {
    if (version.isAuthoredBy(reviewer)) {
      throw new AuthorizationError("SELF_REVIEW", "You cannot review your own transcription");
    }
    this.requireActive(version);
    if (this.props.status !== "submitted") {
      if (version.isReviewed()) {
        throw new ConflictError("ALREADY_REVIEWED", "This transcription has already been reviewed");
      }
      throw new ConflictError(
        "INVALID_TRANSITION",
        `Transcription is ${this.props.status} and cannot be reviewed`
      );
    }
    if (action === "accept") {
      return {
        asset: this.next({ status: "completed" }, now),
        stamp: version.markAccepted(reviewer, now)
      };
    }
    return {
      asset: this.next({ status: "in_progress" }, now),
      stamp: version.markRejected(reviewer, now)
    };
  }

  private undo(active: TranscriptionVersion | null, now: Date): TranscriptionTransition {
    this.requireEditable();
    const previous = active?.getSupersedes() ?? null;
    if (!active || !previous) {
      throw new ValidationError("NO_PREVIOUS_VERSION", "There is no earlier transcription to restore");
    }
    this.requireActive(active);
    return { asset: this.next({ activeVersionId: previous }, now) };
  }

  private redo(next: TranscriptionVersion | null, now: Date): TranscriptionTransition {
    this.requireEditable();
    if (!this.canRedo()) {
      throw new ValidationError("NO_NEXT_VERSION", "There is no later transcription to restore");
    }
    if (!next || !sameVersion(next.getSupersedes(), this.props.activeVersionId)) {
      throw new DomainError("CHAIN_CORRUPT", "Redo target is not on the current branch");
    }
    return { asset: this.next({ activeVersionId: next.getVersionId() }, now) };
  }
}
