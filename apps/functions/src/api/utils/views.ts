import type { Lease } from "@scriptorium/reservation";
import type { AssetTranscription, TranscriptionVersion } from "@scriptorium/transcription";

const iso = (value: Date | null): string | null => (value ? value.toISOString() : null);

export const assetView = (asset: AssetTranscription) => ({
  assetId: asset.getAssetId().toString(),
  status: asset.getStatus(),
  activeVersionId: asset.getActiveVersionId()?.toString() ?? null,
  headVersionId: asset.getHeadVersionId()?.toString() ?? null
});

export const versionView = (version: TranscriptionVersion) => ({
  versionId: version.getVersionId().toString(),
  text: version.getText(),
  author: version.getAuthor().toString(),
  createdAt: version.getCreatedAt().toISOString(),
  supersedes: version.getSupersedes()?.toString() ?? null,
  submittedAt: iso(version.getSubmittedAt()),
  acceptedAt: iso(version.getAcceptedAt()),
  rejectedAt: iso(version.getRejectedAt()),
  reviewedBy: version.getReviewedBy()?.toString() ?? null,
  ocrGenerated: version.isOcrGenerated(),
  ocrOriginated: version.isOcrOriginated()
});

export const reservationView = (lease: Lease | null) =>
  lease
    ? { holder: lease.getHolder().toString(), expiresAt: lease.getExpiresAt().toISOString() }
    : null;
