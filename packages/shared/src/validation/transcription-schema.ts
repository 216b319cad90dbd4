import { z } from "zod";

const URL_RE = /(https?:\/\/|www\.)\S+/i;

export const containsUrl = (value: string): boolean => URL_RE.test(value);

const supersedesSchema = z
  .string({ invalid_type_error: "validation.transcription.supersedes.invalid" })
  .trim()
  .min(1, "validation.transcription.supersedes.invalid")
  .nullable()
  .optional();

// An empty string is the explicit "nothing to transcribe" marker and is valid.
export const transcriptionSaveSchema = z.object({
  text: z
    .string({
      required_error: "validation.transcription.text.required",
      invalid_type_error: "validation.transcription.text.required"
    })
    .refine((value) => !containsUrl(value), "validation.transcription.text.url"),
  supersedes: supersedesSchema
});

export const transcriptionReviewSchema = z.object({
  action: z.enum(["accept", "reject"], {
    errorMap: () => ({ message: "validation.transcription.review.action" })
  })
});

export const ocrRequestSchema = z.object({
  language: z
    .string({ invalid_type_error: "validation.ocr.language.invalid" })
    .regex(/^[a-z]{3}(_[a-z]+)?(\+[a-z]{3}(_[a-z]+)?)*$/, "validation.ocr.language.invalid")
    .optional(),
  supersedes: supersedesSchema
});
