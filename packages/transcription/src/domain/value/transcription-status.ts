export const TRANSCRIPTION_STATUSES = ["not_started", "in_progress", "submitted", "completed"] as const;

export type TranscriptionStatus = (typeof TRANSCRIPTION_STATUSES)[number];

export const isTranscriptionStatus = (value: unknown): value is TranscriptionStatus =>
  typeof value === "string" && TRANSCRIPTION_STATUSES.some((status) => status === value);

// The original author may only change text in these states.
export const isEditableStatus = (status: TranscriptionStatus): boolean =>
  status === "not_started" || status === "in_progress";
