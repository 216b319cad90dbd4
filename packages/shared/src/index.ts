export * from "./error/domain-error.js";
export * from "./util/guard.js";
export * from "./time/time.js";
export * from "./value/asset-id.js";
export * from "./value/user-id.js";
export * from "./protocol/reservation.js";
export * from "./validation/transcription-schema.js";
