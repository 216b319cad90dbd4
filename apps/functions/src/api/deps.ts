import { getAuth } from "firebase-admin/auth";
import { FirestoreLeaseStore, ReservationManager } from "@scriptorium/reservation";
import { FirestoreTranscriptionRepository } from "@scriptorium/transcription";
import type { AppConfig } from "../config.js";
import type { ApiDeps, AuthState } from "./types.js";
import { unauthorizedError } from "./middlewares/auth.js";
import { HttpOcrService } from "./utils/ocr-client.js";
import { FirestoreRateLimiter } from "./utils/rate-limit.js";

const isAuthError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string" &&
  error.code.startsWith("auth/");

export const verifyBearerToken = async (authHeader: string | null | undefined): Promise<AuthState> => {
  const match = String(authHeader ?? "").match(/^Bearer (.+)$/);
  const token = match?.[1];
  if (!token) throw unauthorizedError();
  try {
    const decoded = await getAuth().verifyIdToken(token);
    return { uid: decoded.uid, email: decoded.email ?? null };
  } catch (error) {
    if (isAuthError(error)) {
      throw unauthorizedError();
    }
    throw error;
  }
};

export const createDefaultDeps = (config: AppConfig): ApiDeps => {
  const now = () => new Date();
  return {
    reservations: new ReservationManager(new FirestoreLeaseStore(), config.leasePolicy, now),
    transcriptions: new FirestoreTranscriptionRepository(),
    ocr: new HttpOcrService(config.ocr.serviceUrl),
    ocrSettings: {
      defaultLanguage: config.ocr.defaultLanguage,
      rateLimitWindowMs: config.ocr.rateLimitWindowMs
    },
    rateLimiter: new FirestoreRateLimiter(),
    reviewSettings: config.review,
    now,
    getAuthUser: verifyBearerToken
  };
};
