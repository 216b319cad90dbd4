import { Hono } from "hono";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import * as logger from "firebase-functions/logger";
import {
  AuthorizationError,
  ConflictError,
  DomainError,
  LeaseExpiredError,
  NotFoundError,
  RateLimitedError,
  UnavailableError
} from "@scriptorium/shared";
import type { ApiBindings, ApiDeps } from "./types.js";
import { createAuthMiddleware } from "./middlewares/auth.js";
import { assetsRoutes } from "./routes/assets.js";
import { transcriptionsRoutes } from "./routes/transcriptions.js";
import { jsonError } from "./utils/response.js";

const statusOf = (error: DomainError): ContentfulStatusCode => {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof AuthorizationError) return 403;
  if (error instanceof ConflictError) return 409;
  if (error instanceof LeaseExpiredError) return 408;
  if (error instanceof RateLimitedError) return 429;
  if (error instanceof UnavailableError) return 503;
  return 400;
};

export const createApp = (deps: ApiDeps) => {
  const app = new Hono<ApiBindings>().basePath("/v1");

  app.use("*", async (c, next) => {
    c.set("deps", deps);
    await next();
  });

  app.use(
    "*",
    cors({
      origin: (origin) => origin ?? "*",
      allowMethods: ["GET", "POST", "PATCH", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"]
    })
  );

  const authMiddleware = createAuthMiddleware();

  const assets = new Hono<ApiBindings>();
  assets.use("*", createAuthMiddleware({ bodyTokenPath: /\/reservation\/release$/ }));
  assets.route("/", assetsRoutes());
  app.route("/assets", assets);

  const transcriptions = new Hono<ApiBindings>();
  transcriptions.use("*", authMiddleware);
  transcriptions.route("/", transcriptionsRoutes());
  app.route("/transcriptions", transcriptions);

  app.onError((err, c) => {
    if (err instanceof HTTPException) return err.getResponse();
    if (err.message === "UNAUTHORIZED") {
      return jsonError(c, 401, "UNAUTHORIZED", "Authentication required");
    }
    if (err instanceof RateLimitedError) {
      c.header("Retry-After", String(err.retryAfterSeconds));
    }
    if (err instanceof DomainError) {
      return jsonError(c, statusOf(err), err.code, err.message);
    }
    logger.error(err);
    return jsonError(c, 500, "INTERNAL_ERROR", "Internal server error");
  });

  app.notFound((c) => jsonError(c, 404, "NOT_FOUND", "Not found"));

  return app;
};
