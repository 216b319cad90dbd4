import * as logger from "firebase-functions/logger";
import {
  ConflictError,
  DomainError,
  RateLimitedError,
  UnavailableError,
  type AssetId,
  type UserId
} from "@scriptorium/shared";
import { SYSTEM_AUTHOR } from "../../domain/entity/transcription-version.js";
import { sameVersion, type VersionId } from "../../domain/value/version-id.js";
import type { EditLease } from "../port/edit-lease.js";
import type { OcrService } from "../port/ocr-service.js";
import type { RateLimiter } from "../port/rate-limiter.js";
import type { TranscriptionChain } from "../transcription-chain.js";
import type { SaveTranscriptionResult } from "./save-transcription.js";

export type OcrSettings = {
  defaultLanguage: string;
  rateLimitWindowMs: number;
};

export type GenerateOcrTranscriptionInput = {
  assetId: AssetId;
  actor: UserId;
  language?: string;
  supersedes: VersionId | null;
  now: Date;
};

export class GenerateOcrTranscription {
  constructor(
    private readonly chain: TranscriptionChain,
    private readonly lease: EditLease,
    private readonly ocr: OcrService,
    private readonly rateLimiter: RateLimiter,
    private readonly settings: OcrSettings
  ) {}

  async execute(input: GenerateOcrTranscriptionInput): Promise<SaveTranscriptionResult> {
    const context = { assetId: input.assetId.toString(), actor: input.actor.toString() };
    await this.lease.requireLease(input.assetId, input.actor);

    const snapshot = await this.chain.snapshot(input.assetId);
    if (!snapshot.asset.isEditable()) {
      throw new ConflictError(
        "INVALID_TRANSITION",
        `Transcription is ${snapshot.asset.getStatus()} and cannot be edited`
      );
    }
    if (!sameVersion(input.supersedes, snapshot.asset.getActiveVersionId())) {
      throw new ConflictError("VERSION_SUPERSEDED", "This transcription has been superseded");
    }

    const retryAfterSeconds = await this.rateLimiter.attempt(
      `ocr:${input.assetId.toString()}`,
      { windowMs: this.settings.rateLimitWindowMs, maxCalls: 1 },
      input.now
    );
    if (retryAfterSeconds > 0) {
      logger.warn("ocr rate limited", { ...context, retryAfterSeconds });
      throw new RateLimitedError("RATE_LIMITED", "OCR was run recently, try again later", retryAfterSeconds);
    }

    const language = input.language ?? this.settings.defaultLanguage;
    let text: string;
    try {
      text = await this.ocr.extract({ assetId: input.assetId, language });
    } catch (error) {
      if (error instanceof DomainError) throw error;
      logger.warn("ocr failed", {
        ...context,
        language,
        error: error instanceof Error ? error.message : String(error)
      });
      throw new UnavailableError("OCR_UNAVAILABLE", "OCR could not be completed");
    }

    const base = snapshot.asset.getActiveVersionId();
    const ocrEntry = { author: input.actor, text, ocrGenerated: true };
    // A blank base lets the OCR result be undone.
    const entries = base ? [ocrEntry] : [{ author: SYSTEM_AUTHOR, text: "" }, ocrEntry];
    const version = (await this.chain.appendAll(input.assetId, base, entries, input.now)).at(-1);
    if (!version) {
      throw new DomainError("CHAIN_CORRUPT", "OCR produced no version");
    }

    const after = await this.chain.snapshot(input.assetId);
    return {
      version,
      asset: after.asset,
      undoAvailable: after.undoAvailable,
      redoAvailable: after.redoAvailable,
      contributorCount: await this.chain.contributorCount(input.assetId)
    };
  }
}
