import { Hono } from "hono";
import { UserId, transcriptionReviewSchema } from "@scriptorium/shared";
import {
  ReviewTranscription,
  SubmitTranscription,
  TranscriptionChain,
  VersionId
} from "@scriptorium/transcription";
import type { ApiBindings } from "../types.js";
import { jsonError, jsonOk } from "../utils/response.js";
import { assetView } from "../utils/views.js";

export const transcriptionsRoutes = () => {
  const app = new Hono<ApiBindings>();

  app.post("/:versionId/submit", async (c) => {
    const deps = c.get("deps");
    const versionId = VersionId.create(c.req.param("versionId"));
    const usecase = new SubmitTranscription(new TranscriptionChain(deps.transcriptions), deps.reservations);
    const asset = await usecase.execute({
      versionId,
      actor: UserId.create(c.get("auth").uid),
      now: deps.now()
    });
    return jsonOk(c, { versionId: versionId.toString(), asset: assetView(asset) });
  });

  app.patch("/:versionId/review", async (c) => {
    const deps = c.get("deps");
    const body: unknown = await c.req.json().catch(() => ({}));
    const parsed = transcriptionReviewSchema.safeParse(body);
    if (!parsed.success) {
      return jsonError(c, 400, "VALIDATION_ERROR", parsed.error.issues[0]?.message ?? "Invalid request");
    }

    const versionId = VersionId.create(c.req.param("versionId"));
    const usecase = new ReviewTranscription(
      new TranscriptionChain(deps.transcriptions),
      deps.reservations,
      deps.rateLimiter,
      deps.reviewSettings
    );
    const asset = await usecase.execute({
      versionId,
      reviewer: UserId.create(c.get("auth").uid),
      action: parsed.data.action,
      now: deps.now()
    });
    return jsonOk(c, { versionId: versionId.toString(), asset: assetView(asset) });
  });

  return app;
};
