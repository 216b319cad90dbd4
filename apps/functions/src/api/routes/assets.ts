import { Hono } from "hono";
import {
  AssetId,
  UserId,
  ocrRequestSchema,
  transcriptionSaveSchema
} from "@scriptorium/shared";
import {
  GenerateOcrTranscription,
  GetTranscriptionState,
  ListTranscriptionHistory,
  RollbackTranscription,
  RollforwardTranscription,
  SaveTranscription,
  TranscriptionChain,
  VersionId,
  type MoveCursorResult,
  type SaveTranscriptionResult
} from "@scriptorium/transcription";
import type { ApiBindings } from "../types.js";
import { jsonError, jsonOk } from "../utils/response.js";
import { assetView, reservationView, versionView } from "../utils/views.js";

const toVersionId = (value: string | null | undefined): VersionId | null =>
  value ? VersionId.create(value) : null;

const cursorBody = (result: MoveCursorResult) => ({
  versionId: result.version.getVersionId().toString(),
  text: result.version.getText(),
  undoAvailable: result.undoAvailable,
  redoAvailable: result.redoAvailable,
  asset: assetView(result.asset)
});

const savedBody = (result: SaveTranscriptionResult) => ({
  ...cursorBody(result),
  contributorCount: result.contributorCount
});

export const assetsRoutes = () => {
  const app = new Hono<ApiBindings>();

  app.post("/:assetId/reservation", async (c) => {
    const deps = c.get("deps");
    const assetId = AssetId.create(c.req.param("assetId"));
    const holder = UserId.create(c.get("auth").uid);

    const outcome = await deps.reservations.reserve(assetId, holder);
    switch (outcome.type) {
      case "GRANTED":
        return jsonOk(c, {
          assetId: assetId.toString(),
          holder: holder.toString(),
          expiresAt: outcome.lease.getExpiresAt().toISOString(),
          renewed: outcome.renewed
        });
      case "CONFLICT":
        if (outcome.reason === "UNAVAILABLE") {
          return jsonError(c, 409, "LEASE_STORE_UNAVAILABLE", "Reservation could not be verified");
        }
        return jsonError(c, 409, "LEASE_HELD", "Someone else is working on this asset");
      case "EXPIRED":
        return jsonError(
          c,
          408,
          "LEASE_EXPIRED",
          outcome.reason === "TOMBSTONED"
            ? "This asset was held too long; try again later"
            : "Your reservation expired"
        );
    }
  });

  app.post("/:assetId/reservation/release", async (c) => {
    const deps = c.get("deps");
    const assetId = AssetId.create(c.req.param("assetId"));
    const released = await deps.reservations.release(assetId, UserId.create(c.get("auth").uid));
    return jsonOk(c, { assetId: assetId.toString(), released });
  });

  app.get("/:assetId/transcription", async (c) => {
    const deps = c.get("deps");
    const assetId = AssetId.create(c.req.param("assetId"));
    const state = await new GetTranscriptionState(new TranscriptionChain(deps.transcriptions)).execute(assetId);
    const lease = await deps.reservations.current(assetId);
    return jsonOk(c, {
      assetId: assetId.toString(),
      status: state.status,
      activeVersion: state.active ? versionView(state.active) : null,
      undoAvailable: state.undoAvailable,
      redoAvailable: state.redoAvailable,
      contributorCount: state.contributorCount,
      reservation: reservationView(lease)
    });
  });

  app.get("/:assetId/transcription/history", async (c) => {
    const deps = c.get("deps");
    const assetId = AssetId.create(c.req.param("assetId"));
    const limitParam = Number(c.req.query("limit"));
    const limit = Number.isInteger(limitParam) && limitParam > 0 ? limitParam : undefined;
    const versions = await new ListTranscriptionHistory(new TranscriptionChain(deps.transcriptions)).execute(
      assetId,
      limit
    );
    return jsonOk(c, versions.map(versionView));
  });

  app.post("/:assetId/transcriptions", async (c) => {
    const deps = c.get("deps");
    const body: unknown = await c.req.json().catch(() => ({}));
    const parsed = transcriptionSaveSchema.safeParse(body);
    if (!parsed.success) {
      return jsonError(c, 400, "VALIDATION_ERROR", parsed.error.issues[0]?.message ?? "Invalid request");
    }

    const usecase = new SaveTranscription(new TranscriptionChain(deps.transcriptions), deps.reservations);
    const result = await usecase.execute({
      assetId: AssetId.create(c.req.param("assetId")),
      author: UserId.create(c.get("auth").uid),
      text: parsed.data.text,
      supersedes: toVersionId(parsed.data.supersedes),
      now: deps.now()
    });
    const versionId = result.version.getVersionId().toString();
    return jsonOk(
      c,
      {
        versionId,
        submitUrl: `/v1/transcriptions/${encodeURIComponent(versionId)}/submit`,
        undoAvailable: result.undoAvailable,
        redoAvailable: result.redoAvailable,
        contributorCount: result.contributorCount,
        asset: assetView(result.asset)
      },
      201
    );
  });

  app.post("/:assetId/transcription/rollback", async (c) => {
    const deps = c.get("deps");
    const usecase = new RollbackTranscription(new TranscriptionChain(deps.transcriptions), deps.reservations);
    const result = await usecase.execute({
      assetId: AssetId.create(c.req.param("assetId")),
      actor: UserId.create(c.get("auth").uid),
      now: deps.now()
    });
    return jsonOk(c, cursorBody(result), 201);
  });

  app.post("/:assetId/transcription/rollforward", async (c) => {
    const deps = c.get("deps");
    const usecase = new RollforwardTranscription(new TranscriptionChain(deps.transcriptions), deps.reservations);
    const result = await usecase.execute({
      assetId: AssetId.create(c.req.param("assetId")),
      actor: UserId.create(c.get("auth").uid),
      now: deps.now()
    });
    return jsonOk(c, cursorBody(result), 201);
  });

  app.post("/:assetId/transcription/ocr", async (c) => {
    const deps = c.get("deps");
    const body: unknown = await c.req.json().catch(() => ({}));
    const parsed = ocrRequestSchema.safeParse(body);
    if (!parsed.success) {
      return jsonError(c, 400, "VALIDATION_ERROR", parsed.error.issues[0]?.message ?? "Invalid request");
    }

    const usecase = new GenerateOcrTranscription(
      new TranscriptionChain(deps.transcriptions),
      deps.reservations,
      deps.ocr,
      deps.rateLimiter,
      deps.ocrSettings
    );
    const result = await usecase.execute({
      assetId: AssetId.create(c.req.param("assetId")),
      actor: UserId.create(c.get("auth").uid),
      language: parsed.data.language,
      supersedes: toVersionId(parsed.data.supersedes),
      now: deps.now()
    });
    return jsonOk(c, savedBody(result), 201);
  });

  return app;
};
