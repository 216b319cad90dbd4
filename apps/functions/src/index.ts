import "dotenv/config";
import { onRequest } from "firebase-functions/v2/https";
import { onSchedule } from "firebase-functions/v2/scheduler";
import * as logger from "firebase-functions/logger";
import { getApps, initializeApp } from "firebase-admin/app";
import cors from "cors";
import { FirestoreLeaseStore, SweepLeases } from "@scriptorium/reservation";
import { loadConfig } from "./config.js";
import { createApp } from "./api/app.js";
import { createDefaultDeps } from "./api/deps.js";
import { requestHandler } from "./api/handler.js";

if (getApps().length === 0) {
  initializeApp();
}

const config = loadConfig();
const handler = requestHandler(createApp(createDefaultDeps(config)));
// Preflights continue into the app, whose cors middleware answers them.
const corsHandler = cors({
  origin: true,
  methods: ["GET", "POST", "PATCH", "OPTIONS"],
  allowedHeaders: ["Content-Type", "Authorization"],
  preflightContinue: true
});

export const api = onRequest(async (req, res) => {
  logger.info("api called", { method: req.method, path: req.path });
  await new Promise<void>((resolve, reject) => {
    corsHandler(req, res, () => {
      handler(req, res).then(resolve, reject);
    });
  });
});

export const sweepLeases = onSchedule("every 5 minutes", async () => {
  await new SweepLeases(new FirestoreLeaseStore()).execute(new Date());
});
