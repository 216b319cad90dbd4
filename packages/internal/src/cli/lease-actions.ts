import { getApps, initializeApp } from "firebase-admin/app";
import { AssetId } from "@scriptorium/shared";
import { FirestoreLeaseStore } from "@scriptorium/reservation";

const ensureEmulator = () => {
  if (!process.env.FIRESTORE_EMULATOR_HOST) {
    process.env.FIRESTORE_EMULATOR_HOST = "127.0.0.1:8080";
  }
};

const ensureApp = (projectId: string) => {
  if (getApps().length === 0) {
    initializeApp({ projectId });
  }
};

export type LeaseSummary = {
  assetId: string;
  holder: string;
  expiresAt: Date;
  state: string;
};

export const inspectLease = async (input: { assetId: string; projectId: string }): Promise<LeaseSummary | null> => {
  ensureEmulator();
  ensureApp(input.projectId);

  const lease = await new FirestoreLeaseStore().find(AssetId.create(input.assetId));
  if (!lease) {
    return null;
  }
  return {
    assetId: input.assetId,
    holder: lease.getHolder().toString(),
    expiresAt: lease.getExpiresAt(),
    state: lease.stateAt(new Date())
  };
};

export const forceReleaseLease = async (input: { assetId: string; projectId: string }) => {
  ensureEmulator();
  ensureApp(input.projectId);

  const released = await new FirestoreLeaseStore().remove(AssetId.create(input.assetId));
  return { assetId: input.assetId, released };
};
