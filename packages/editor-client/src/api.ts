import { z } from "zod";

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type EditorApiOptions = {
  baseUrl: string;
  getToken: () => Promise<string>;
  fetch?: FetchLike;
};

const statusSchema = z.enum(["not_started", "in_progress", "submitted", "completed"]);

const assetSummarySchema = z.object({
  assetId: z.string(),
  status: statusSchema,
  activeVersionId: z.string().nullable(),
  headVersionId: z.string().nullable()
});

const versionViewSchema = z.object({
  versionId: z.string(),
  text: z.string(),
  author: z.string(),
  createdAt: z.string(),
  supersedes: z.string().nullable(),
  submittedAt: z.string().nullable(),
  acceptedAt: z.string().nullable(),
  rejectedAt: z.string().nullable(),
  reviewedBy: z.string().nullable(),
  ocrGenerated: z.boolean(),
  ocrOriginated: z.boolean()
});

const reservationSchema = z.object({
  assetId: z.string(),
  holder: z.string(),
  expiresAt: z.string(),
  renewed: z.boolean()
});

const releaseSchema = z.object({ assetId: z.string(), released: z.boolean() });

const stateSchema = z.object({
  assetId: z.string(),
  status: statusSchema,
  activeVersion: versionViewSchema.nullable(),
  undoAvailable: z.boolean(),
  redoAvailable: z.boolean(),
  contributorCount: z.number(),
  reservation: z.object({ holder: z.string(), expiresAt: z.string() }).nullable()
});

const saveResultSchema = z.object({
  versionId: z.string(),
  submitUrl: z.string(),
  undoAvailable: z.boolean(),
  redoAvailable: z.boolean(),
  contributorCount: z.number(),
  asset: assetSummarySchema
});

const cursorResultSchema = z.object({
  versionId: z.string(),
  text: z.string(),
  undoAvailable: z.boolean(),
  redoAvailable: z.boolean(),
  asset: assetSummarySchema
});

const ocrResultSchema = cursorResultSchema.extend({ contributorCount: z.number() });

const transitionSchema = z.object({ versionId: z.string(), asset: assetSummarySchema });

const okEnvelopeSchema = z.object({ ok: z.literal(true), data: z.unknown() });

const errorBodySchema = z.object({ ok: z.literal(false), code: z.string(), message: z.string() });

export type TranscriptionStatus = z.infer<typeof statusSchema>;
export type AssetSummary = z.infer<typeof assetSummarySchema>;
export type VersionView = z.infer<typeof versionViewSchema>;
export type TranscriptionStateView = z.infer<typeof stateSchema>;
export type SaveResult = z.infer<typeof saveResultSchema>;
export type CursorResult = z.infer<typeof cursorResultSchema>;
export type OcrResult = z.infer<typeof ocrResultSchema>;
export type TransitionResult = z.infer<typeof transitionSchema>;

export type ReserveGranted = { type: "GRANTED"; expiresAt: Date; renewed: boolean };
export type ReserveConflict = { type: "CONFLICT"; code: string };
export type ReserveExpired = { type: "EXPIRED" };
export type ReserveResult = ReserveGranted | ReserveConflict | ReserveExpired;

export type EditorApi = ReturnType<typeof createEditorApi>;

/** Non-2xx responses throw {@link ApiError}, except where `reserve` maps them to outcomes. */
export const createEditorApi = (options: EditorApiOptions) => {
  const fetchFn: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  const base = options.baseUrl.replace(/\/+$/, "");

  const send = async (method: string, path: string, body?: unknown): Promise<Response> => {
    const token = await options.getToken();
    return await fetchFn(`${base}/v1${path}`, {
      method,
      headers: {
        Authorization: `Bearer ${token}`,
        ...(body === undefined ? {} : { "Content-Type": "application/json" })
      },
      body: body === undefined ? undefined : JSON.stringify(body)
    });
  };

  const readJson = async (response: Response): Promise<unknown> => await response.json().catch(() => null);

  const toApiError = (response: Response, payload: unknown): ApiError => {
    const parsed = errorBodySchema.safeParse(payload);
    if (parsed.success) {
      return new ApiError(response.status, parsed.data.code, parsed.data.message);
    }
    return new ApiError(response.status, "UNKNOWN_ERROR", `HTTP ${response.status}`);
  };

  const unwrap = <T>(response: Response, payload: unknown, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T => {
    const envelope = okEnvelopeSchema.safeParse(payload);
    const parsed = envelope.success ? schema.safeParse(envelope.data.data) : null;
    if (!parsed || !parsed.success) {
      throw new ApiError(response.status, "INVALID_RESPONSE", "Unexpected response from server");
    }
    return parsed.data;
  };

  const call = async <T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    method: string,
    path: string,
    body?: unknown
  ): Promise<T> => {
    const response = await send(method, path, body);
    const payload = await readJson(response);
    if (!response.ok) {
      throw toApiError(response, payload);
    }
    return unwrap(response, payload, schema);
  };

  const asset = (assetId: string) => `/assets/${encodeURIComponent(assetId)}`;
  const version = (versionId: string) => `/transcriptions/${encodeURIComponent(versionId)}`;

  return {
    async reserve(assetId: string): Promise<ReserveResult> {
      const response = await send("POST", `${asset(assetId)}/reservation`);
      const payload = await readJson(response);
      if (response.status === 409) {
        const parsed = errorBodySchema.safeParse(payload);
        return { type: "CONFLICT", code: parsed.success ? parsed.data.code : "LEASE_HELD" };
      }
      if (response.status === 408) {
        return { type: "EXPIRED" };
      }
      if (!response.ok) {
        throw toApiError(response, payload);
      }
      const reservation = unwrap(response, payload, reservationSchema);
      return { type: "GRANTED", expiresAt: new Date(reservation.expiresAt), renewed: reservation.renewed };
    },
    release: (assetId: string) => call(releaseSchema, "POST", `${asset(assetId)}/reservation/release`),
    releaseUrl: (assetId: string) => `${base}/v1${asset(assetId)}/reservation/release`,
    getState: (assetId: string) => call(stateSchema, "GET", `${asset(assetId)}/transcription`),
    getHistory: (assetId: string) =>
      call(z.array(versionViewSchema), "GET", `${asset(assetId)}/transcription/history`),
    save: (assetId: string, input: { text: string; supersedes: string | null }) =>
      call(saveResultSchema, "POST", `${asset(assetId)}/transcriptions`, input),
    rollback: (assetId: string) => call(cursorResultSchema, "POST", `${asset(assetId)}/transcription/rollback`),
    rollforward: (assetId: string) =>
      call(cursorResultSchema, "POST", `${asset(assetId)}/transcription/rollforward`),
    ocr: (assetId: string, input: { language?: string; supersedes: string | null }) =>
      call(ocrResultSchema, "POST", `${asset(assetId)}/transcription/ocr`, input),
    submit: (versionId: string) => call(transitionSchema, "POST", `${version(versionId)}/submit`),
    review: (versionId: string, action: "accept" | "reject") =>
      call(transitionSchema, "PATCH", `${version(versionId)}/review`, { action })
  };
};
