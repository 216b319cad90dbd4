import { getFirestore } from "firebase-admin/firestore";
import { ConflictError, type AssetId } from "@scriptorium/shared";
import type { AssetTranscription } from "../../domain/entity/asset-transcription.js";
import type { TranscriptionVersion } from "../../domain/entity/transcription-version.js";
import { VersionId } from "../../domain/value/version-id.js";
import type {
  TranscriptionCommit,
  TranscriptionRepository
} from "../../application/port/transcription-repository.js";
import {
  mapAssetTranscriptionFromFirestore,
  mapAssetTranscriptionToFirestore,
  mapVersionFromFirestore,
  mapVersionToFirestore
} from "./transcription-firestore-mapper.js";

const ASSETS = "assetTranscriptions";
const VERSIONS = "transcriptions";

export class FirestoreTranscriptionRepository implements TranscriptionRepository {
  async generateVersionId(): Promise<VersionId> {
    const doc = getFirestore().collection(VERSIONS).doc();
    return VersionId.create(doc.id);
  }

  async findAsset(assetId: AssetId): Promise<AssetTranscription | null> {
    const snapshot = await getFirestore().collection(ASSETS).doc(assetId.toString()).get();
    if (!snapshot.exists) {
      return null;
    }
    return mapAssetTranscriptionFromFirestore(snapshot.data() ?? {}, snapshot.id);
  }

  async findVersion(versionId: VersionId): Promise<TranscriptionVersion | null> {
    const snapshot = await getFirestore().collection(VERSIONS).doc(versionId.toString()).get();
    if (!snapshot.exists) {
      return null;
    }
    return mapVersionFromFirestore(snapshot.data() ?? {}, snapshot.id);
  }

  async listByAsset(assetId: AssetId): Promise<TranscriptionVersion[]> {
    const snapshot = await getFirestore()
      .collection(VERSIONS)
      .where("assetId", "==", assetId.toString())
      .get();
    return snapshot.docs.map((doc) => mapVersionFromFirestore(doc.data() ?? {}, doc.id));
  }

  async commit(commit: TranscriptionCommit): Promise<void> {
    const db = getFirestore();
    const assetRef = db.collection(ASSETS).doc(commit.asset.getAssetId().toString());
    await db.runTransaction(async (tx) => {
      const snapshot = await tx.get(assetRef);
      const stored = snapshot.exists
        ? mapAssetTranscriptionFromFirestore(snapshot.data() ?? {}, snapshot.id).getRevision()
        : 0;
      if (stored !== commit.expectedRevision) {
        throw new ConflictError("CONCURRENT_UPDATE", "The transcription changed while you were editing");
      }
      tx.set(assetRef, mapAssetTranscriptionToFirestore(commit.asset));
      for (const version of commit.append) {
        tx.create(db.collection(VERSIONS).doc(version.getVersionId().toString()), mapVersionToFirestore(version));
      }
      if (commit.stamp) {
        tx.set(
          db.collection(VERSIONS).doc(commit.stamp.getVersionId().toString()),
          mapVersionToFirestore(commit.stamp)
        );
      }
    });
  }
}
