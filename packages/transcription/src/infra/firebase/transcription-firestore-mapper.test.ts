import { describe, it, expect } from "vitest";
import { AssetId, DomainError, UserId } from "@scriptorium/shared";
import {
  mapAssetTranscriptionFromFirestore,
  mapAssetTranscriptionToFirestore,
  mapVersionFromFirestore,
  mapVersionToFirestore
} from "./transcription-firestore-mapper.js";
import { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import { VersionId } from "../../domain/value/version-id.js";

const timestamp = (iso: string) => ({ toDate: () => new Date(iso) });

describe("mapVersionFromFirestore", () => {
  it("maps firestore data to a TranscriptionVersion", () => {
    const version = mapVersionFromFirestore(
      {
        assetId: "42",
        text: "Hello",
        author: "alice",
        createdAt: timestamp("2024-01-01T00:00:00.000Z"),
        supersedes: "v0",
        submittedAt: timestamp("2024-01-01T01:00:00.000Z"),
        acceptedAt: null,
        rejectedAt: null,
        reviewedBy: null,
        ocrGenerated: true
      },
      "v1"
    );

    expect(version.getVersionId().toString()).toBe("v1");
    expect(version.getSupersedes()?.toString()).toBe("v0");
    expect(version.getSubmittedAt()?.toISOString()).toBe("2024-01-01T01:00:00.000Z");
    expect(version.getAcceptedAt()).toBeNull();
    expect(version.getReviewedBy()).toBeNull();
    expect(version.isOcrGenerated()).toBe(true);
    expect(version.isOcrOriginated()).toBe(false);
  });

  it("rejects a version without an author", () => {
    expect(() => mapVersionFromFirestore({ assetId: "42", createdAt: new Date() }, "v1")).toThrow(DomainError);
  });

  it("writes null for absent links and stamps", () => {
    const version = TranscriptionVersion.create({
      versionId: VersionId.create("v1"),
      assetId: AssetId.create("42"),
      text: "",
      author: UserId.create("alice"),
      supersedes: null,
      ocrGenerated: false,
      ocrOriginated: false,
      now: new Date("2024-01-01T00:00:00.000Z")
    });
    expect(mapVersionToFirestore(version)).toEqual({
      versionId: "v1",
      assetId: "42",
      text: "",
      author: "alice",
      createdAt: new Date("2024-01-01T00:00:00.000Z"),
      supersedes: null,
      submittedAt: null,
      acceptedAt: null,
      rejectedAt: null,
      reviewedBy: null,
      ocrGenerated: false,
      ocrOriginated: false
    });
  });
});

describe("mapAssetTranscriptionFromFirestore", () => {
  it("reads the cursor and revision", () => {
    const asset = mapAssetTranscriptionFromFirestore(
      {
        status: "in_progress",
        activeVersionId: "v1",
        headVersionId: "v2",
        revision: 3,
        updatedAt: timestamp("2024-01-01T00:00:00.000Z")
      },
      "42"
    );

    expect(asset.getAssetId().toString()).toBe("42");
    expect(asset.getActiveVersionId()?.toString()).toBe("v1");
    expect(asset.getHeadVersionId()?.toString()).toBe("v2");
    expect(asset.getRevision()).toBe(3);
    expect(asset.canRedo()).toBe(true);
    expect(mapAssetTranscriptionToFirestore(asset)).toEqual({
      assetId: "42",
      status: "in_progress",
      activeVersionId: "v1",
      headVersionId: "v2",
      revision: 3,
      updatedAt: new Date("2024-01-01T00:00:00.000Z")
    });
  });

  it("rejects an unknown status", () => {
    expect(() => mapAssetTranscriptionFromFirestore({ status: "archived" }, "42")).toThrow(
      "Asset 42 has an unknown status"
    );
  });
});
