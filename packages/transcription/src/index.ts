export * from "./domain/value/version-id.js";
export * from "./domain/value/transcription-status.js";
export * from "./domain/entity/transcription-version.js";
export * from "./domain/entity/asset-transcription.js";
export * from "./application/port/transcription-repository.js";
export * from "./application/port/edit-lease.js";
export * from "./application/port/ocr-service.js";
export * from "./application/port/rate-limiter.js";
export * from "./application/transcription-chain.js";
export * from "./application/usecase/save-transcription.js";
export * from "./application/usecase/submit-transcription.js";
export * from "./application/usecase/review-transcription.js";
export * from "./application/usecase/move-transcription-cursor.js";
export * from "./application/usecase/generate-ocr-transcription.js";
export * from "./application/usecase/get-transcription-state.js";
export * from "./application/usecase/list-transcription-history.js";
export * from "./infra/memory/in-memory-transcription-repository.js";
export * from "./infra/firebase/firestore-transcription-repository.js";
export * from "./infra/firebase/transcription-firestore-mapper.js";
