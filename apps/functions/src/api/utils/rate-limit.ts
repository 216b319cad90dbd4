import { getFirestore } from "firebase-admin/firestore";
import { coerceDate } from "@scriptorium/shared";
import type { RateLimit, RateLimiter } from "@scriptorium/transcription";

const COLLECTION = "rateLimits";

export type Admission = {
  retryAfterSeconds: number;
  calls: Date[];
};

/** Sliding window: `calls` comes back trimmed to the window, with `now` added when admitted. */
export const admit = (calls: Date[], limit: RateLimit, now: Date): Admission => {
  const recent = calls.filter((call) => call.getTime() + limit.windowMs > now.getTime());
  if (limit.windowMs <= 0 || recent.length < limit.maxCalls) {
    return { retryAfterSeconds: 0, calls: limit.windowMs > 0 ? [...recent, now] : [] };
  }
  const oldest = Math.min(...recent.map((call) => call.getTime()));
  const remaining = oldest + limit.windowMs - now.getTime();
  return { retryAfterSeconds: Math.max(1, Math.ceil(remaining / 1000)), calls: recent };
};

export class InMemoryRateLimiter implements RateLimiter {
  private readonly calls = new Map<string, Date[]>();

  async attempt(key: string, limit: RateLimit, now: Date): Promise<number> {
    const admission = admit(this.calls.get(key) ?? [], limit, now);
    this.calls.set(key, admission.calls);
    return admission.retryAfterSeconds;
  }
}

/** One document per key under `rateLimits`, read and written in a transaction. */
export class FirestoreRateLimiter implements RateLimiter {
  async attempt(key: string, limit: RateLimit, now: Date): Promise<number> {
    const db = getFirestore();
    const ref = db.collection(COLLECTION).doc(key);
    return await db.runTransaction(async (tx) => {
      const snapshot = await tx.get(ref);
      const stored: unknown = snapshot.exists ? snapshot.get("calls") : [];
      const calls = (Array.isArray(stored) ? stored : [])
        .map((value) => coerceDate(value))
        .filter((value): value is Date => value !== null);
      const admission = admit(calls, limit, now);
      if (admission.retryAfterSeconds === 0) {
        tx.set(ref, { calls: admission.calls });
      }
      return admission.retryAfterSeconds;
    });
  }
}
