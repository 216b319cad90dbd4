import { AssetId, UserId } from "@scriptorium/shared";
import { VersionId } from "../value/version-id.js";

// Author of the blank version placed under the first OCR result.
export const SYSTEM_AUTHOR = UserId.create("system");

export type TranscriptionVersionProps = {
  versionId: VersionId;
  assetId: AssetId;
  text: string;
  author: UserId;
  createdAt: Date;
  supersedes: VersionId | null;
  submittedAt: Date | null;
  acceptedAt: Date | null;
  rejectedAt: Date | null;
  reviewedBy: UserId | null;
  ocrGenerated: boolean;
  ocrOriginated: boolean;
};

export type TranscriptionVersionCreateParams = {
  versionId: VersionId;
  assetId: AssetId;
  text: string;
  author: UserId;
  supersedes: VersionId | null;
  ocrGenerated: boolean;
  ocrOriginated: boolean;
  now: Date;
};

/**
 * An immutable snapshot of one save. The only later changes are the submission and
 * review stamps, each of which yields a new instance.
 */
export class TranscriptionVersion {
  private constructor(private readonly props: TranscriptionVersionProps) {}

  static create(params: TranscriptionVersionCreateParams): TranscriptionVersion {
    return new TranscriptionVersion({
      versionId: params.versionId,
      assetId: params.assetId,
      text: params.text,
      author: params.author,
      createdAt: params.now,
      supersedes: params.supersedes,
      submittedAt: null,
      acceptedAt: null,
      rejectedAt: null,
      reviewedBy: null,
      ocrGenerated: params.ocrGenerated,
      ocrOriginated: params.ocrOriginated
    });
  }

  static reconstruct(props: TranscriptionVersionProps): TranscriptionVersion {
    return new TranscriptionVersion({ ...props });
  }

  markSubmitted(now: Date): TranscriptionVersion {
    return new TranscriptionVersion({ ...this.props, submittedAt: now });
  }

  markAccepted(reviewer: UserId, now: Date): TranscriptionVersion {
    return new TranscriptionVersion({ ...this.props, acceptedAt: now, reviewedBy: reviewer });
  }

  markRejected(reviewer: UserId, now: Date): TranscriptionVersion {
    return new TranscriptionVersion({ ...this.props, rejectedAt: now, reviewedBy: reviewer });
  }

  isAuthoredBy(user: UserId): boolean {
    return this.props.author.equals(user);
  }

  isSubmitted(): boolean {
    return this.props.submittedAt !== null;
  }

  isReviewed(): boolean {
    return this.props.acceptedAt !== null || this.props.rejectedAt !== null;
  }

  // True when this text came from OCR, directly or through later edits.
  isOcrDerived(): boolean {
    return this.props.ocrGenerated || this.props.ocrOriginated;
  }

  getVersionId(): VersionId {
    return this.props.versionId;
  }

  getAssetId(): AssetId {
    return this.props.assetId;
  }

  getText(): string {
    return this.props.text;
  }

  getAuthor(): UserId {
    return this.props.author;
  }

  getCreatedAt(): Date {
    return this.props.createdAt;
  }

  getSupersedes(): VersionId | null {
    return this.props.supersedes;
  }

  getSubmittedAt(): Date | null {
    return this.props.submittedAt;
  }

  getAcceptedAt(): Date | null {
    return this.props.acceptedAt;
  }

  getRejectedAt(): Date | null {
    return this.props.rejectedAt;
  }

  getReviewedBy(): UserId | null {
    return this.props.reviewedBy;
  }

  isOcrGenerated(): boolean {
    return this.props.ocrGenerated;
  }

  isOcrOriginated(): boolean {
    return this.props.ocrOriginated;
  }
}
