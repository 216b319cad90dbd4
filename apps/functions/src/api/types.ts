import type { ReservationManager } from "@scriptorium/reservation";
import type {
  OcrService,
  OcrSettings,
  RateLimiter,
  ReviewSettings,
  TranscriptionRepository
} from "@scriptorium/transcription";

export type AuthState = { uid: string; email?: string | null };

export type ApiDeps = {
  reservations: ReservationManager;
  transcriptions: TranscriptionRepository;
  ocr: OcrService;
  ocrSettings: OcrSettings;
  rateLimiter: RateLimiter;
  reviewSettings: ReviewSettings;
  now: () => Date;
  getAuthUser: (authHeader: string | null | undefined) => Promise<AuthState>;
};

export type ApiBindings = {
  Variables: {
    auth: AuthState;
    deps: ApiDeps;
  };
};
