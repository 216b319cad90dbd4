import { AssetId, DomainError, UserId, coerceDate } from "@scriptorium/shared";
import { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import { VersionId } from "../../domain/value/version-id.js";
import { isTranscriptionStatus } from "../../domain/value/transcription-status.js";

type FirestoreData = Record<string, unknown>;

const optionalString = (value: unknown): string | null =>
  typeof value === "string" && value.length > 0 ? value : null;

const optionalVersionId = (value: unknown): VersionId | null => {
  const id = optionalString(value);
  return id ? VersionId.create(id) : null;
};

export const mapVersionFromFirestore = (data: FirestoreData, fallbackId: string): TranscriptionVersion => {
  const assetId = optionalString(data.assetId);
  const author = optionalString(data.author);
  const createdAt = coerceDate(data.createdAt);
  if (!assetId || !author || !createdAt) {
    throw new DomainError("VERSION_RECORD_INVALID", `Transcription ${fallbackId} is incomplete`);
  }
  const reviewedBy = optionalString(data.reviewedBy);
  return TranscriptionVersion.reconstruct({
    versionId: VersionId.create(optionalString(data.versionId) ?? fallbackId),
    assetId: AssetId.create(assetId),
    text: typeof data.text === "string" ? data.text : "",
    author: UserId.create(author),
    createdAt,
    supersedes: optionalVersionId(data.supersedes),
    submittedAt: coerceDate(data.submittedAt),
    acceptedAt: coerceDate(data.acceptedAt),
    rejectedAt: coerceDate(data.rejectedAt),
    reviewedBy: reviewedBy ? UserId.create(reviewedBy) : null,
    ocrGenerated: data.ocrGenerated === true,
    ocrOriginated: data.ocrOriginated === true
  });
};

export const mapVersionToFirestore = (version: TranscriptionVersion) => ({
  versionId: version.getVersionId().toString(),
  assetId: version.getAssetId().toString(),
  text: version.getText(),
  author: version.getAuthor().toString(),
  createdAt: version.getCreatedAt(),
  supersedes: version.getSupersedes()?.toString() ?? null,
  submittedAt: version.getSubmittedAt(),
  acceptedAt: version.getAcceptedAt(),
  rejectedAt: version.getRejectedAt(),
  reviewedBy: version.getReviewedBy()?.toString() ?? null,
  ocrGenerated: version.isOcrGenerated(),
  ocrOriginated: version.isOcrOriginated()
});

export const mapAssetTranscriptionFromFirestore = (
  data: FirestoreData,
  fallbackId: string
): AssetTranscription => {
  const status = data.status;
  if (!isTranscriptionStatus(status)) {
    throw new DomainError("ASSET_RECORD_INVALID", `Asset ${fallbackId} has an unknown status`);
  }
  return AssetTranscription.reconstruct({
    assetId: AssetId.create(optionalString(data.assetId) ?? fallbackId),
    status,
    activeVersionId: optionalVersionId(data.activeVersionId),
    headVersionId: optionalVersionId(data.headVersionId),
    revision: typeof data.revision === "number" ? data.revision : 0,
    updatedAt: coerceDate(data.updatedAt)
  });
};

export const mapAssetTranscriptionToFirestore = (asset: AssetTranscription) => ({
  assetId: asset.getAssetId().toString(),
  status: asset.getStatus(),
  activeVersionId: asset.getActiveVersionId()?.toString() ?? null,
  headVersionId: asset.getHeadVersionId()?.toString() ?? null,
  revision: asset.getRevision(),
  updatedAt: asset.getUpdatedAt()
});
