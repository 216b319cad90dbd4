import { getFirestore } from "firebase-admin/firestore";
import type { AssetId, UserId } from "@scriptorium/shared";
import { Lease, type LeaseClaim } from "../../domain/lease.js";
import type { LeasePolicy } from "../../domain/lease-policy.js";
import type { LeaseStore } from "../../application/port/lease-store.js";
import { mapLeaseFromFirestore, mapLeaseToFirestore } from "./lease-firestore-mapper.js";

const COLLECTION = "assetReservations";

export class FirestoreLeaseStore implements LeaseStore {
  private doc(assetId: AssetId) {
    return getFirestore().collection(COLLECTION).doc(assetId.toString());
  }

  async put(assetId: AssetId, holder: UserId, policy: LeasePolicy, now: Date): Promise<LeaseClaim> {
    const ref = this.doc(assetId);
    return await getFirestore().runTransaction(async (tx) => {
      const snapshot = await tx.get(ref);
      const current = snapshot.exists ? mapLeaseFromFirestore(snapshot.data() ?? {}, snapshot.id) : null;
      const claim = Lease.claim(current, assetId, holder, policy, now);
      if (claim.type === "GRANTED") {
        tx.set(ref, mapLeaseToFirestore(claim.lease));
      }
      if (claim.type === "LAPSED") {
        tx.delete(ref);
      }
      return claim;
    });
  }

  async get(assetId: AssetId, now: Date): Promise<Lease | null> {
    const lease = await this.find(assetId);
    return lease && lease.isLiveAt(now) ? lease : null;
  }

  async find(assetId: AssetId): Promise<Lease | null> {
    const snapshot = await this.doc(assetId).get();
    if (!snapshot.exists) {
      return null;
    }
    return mapLeaseFromFirestore(snapshot.data() ?? {}, snapshot.id);
  }

  async remove(assetId: AssetId, holder?: UserId): Promise<boolean> {
    const ref = this.doc(assetId);
    return await getFirestore().runTransaction(async (tx) => {
      const snapshot = await tx.get(ref);
      if (!snapshot.exists) return false;
      const lease = mapLeaseFromFirestore(snapshot.data() ?? {}, snapshot.id);
      if (holder && !lease.isHeldBy(holder)) return false;
      tx.delete(ref);
      return true;
    });
  }

  async reap(assetId: AssetId, holder: UserId, now: Date): Promise<boolean> {
    const ref = this.doc(assetId);
    return await getFirestore().runTransaction(async (tx) => {
      const snapshot = await tx.get(ref);
      if (!snapshot.exists) return false;
      const lease = mapLeaseFromFirestore(snapshot.data() ?? {}, snapshot.id);
      if (!lease.isHeldBy(holder) || lease.stateAt(now) !== "LAPSED") return false;
      tx.delete(ref);
      return true;
    });
  }

  async sweep(now: Date): Promise<number> {
    const db = getFirestore();
    const candidates = await db.collection(COLLECTION).where("expiresAt", "<=", now).get();
    let removed = 0;
    for (const candidate of candidates.docs) {
      const deleted = await db.runTransaction(async (tx) => {
        const snapshot = await tx.get(candidate.ref);
        if (!snapshot.exists) return false;
        const state = mapLeaseFromFirestore(snapshot.data() ?? {}, snapshot.id).stateAt(now);
        if (state !== "LAPSED" && state !== "GONE") return false;
        tx.delete(candidate.ref);
        return true;
      });
      if (deleted) removed += 1;
    }
    return removed;
  }
}
