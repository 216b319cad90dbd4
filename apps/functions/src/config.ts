import { z } from "zod";
import { DomainError, ValidationError } from "@scriptorium/shared";
import { createLeasePolicy, type LeasePolicy } from "@scriptorium/reservation";
import type { OcrSettings, ReviewSettings } from "@scriptorium/transcription";

const HOUR_MS = 60 * 60 * 1000;
const REVIEW_WINDOW_MS = 60 * 1000;

const envSchema = z.object({
  RESERVATION_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  RESERVATION_MAX_HOLD_HOURS: z.coerce.number().positive().default(12),
  RESERVATION_TOMBSTONE_HOURS: z.coerce.number().min(0).default(24),
  OCR_SERVICE_URL: z.string().url().default("http://127.0.0.1:8089/ocr"),
  OCR_DEFAULT_LANGUAGE: z.string().min(1).default("eng"),
  OCR_RATE_LIMIT_SECONDS: z.coerce.number().int().min(0).default(60),
  REVIEW_RATE_LIMIT: z.coerce.number().int().min(0).default(10)
});

export type AppConfig = {
  leasePolicy: LeasePolicy;
  ocr: OcrSettings & { serviceUrl: string };
  review: ReviewSettings;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      "CONFIG_INVALID",
      issue ? `${issue.path.join(".")}: ${issue.message}` : "Invalid configuration"
    );
  }
  const values = parsed.data;

  let leasePolicy: LeasePolicy;
  try {
    leasePolicy = createLeasePolicy({
      ttlMs: values.RESERVATION_TTL_SECONDS * 1000,
      maxHoldMs: values.RESERVATION_MAX_HOLD_HOURS * HOUR_MS,
      tombstoneRetentionMs: values.RESERVATION_TOMBSTONE_HOURS * HOUR_MS
    });
  } catch (error) {
    if (error instanceof DomainError) {
      throw new ValidationError("CONFIG_INVALID", error.message);
    }
    throw error;
  }

  return {
    leasePolicy,
    ocr: {
      serviceUrl: values.OCR_SERVICE_URL,
      defaultLanguage: values.OCR_DEFAULT_LANGUAGE,
      rateLimitWindowMs: values.OCR_RATE_LIMIT_SECONDS * 1000
    },
    review: {
      acceptLimit: values.REVIEW_RATE_LIMIT,
      windowMs: REVIEW_WINDOW_MS
    }
  };
};
