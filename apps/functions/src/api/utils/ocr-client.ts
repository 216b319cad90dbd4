import { z } from "zod";
import type { OcrRequest, OcrService } from "@scriptorium/transcription";

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

const ocrResponseSchema = z.object({ text: z.string() });

/** Client for the external OCR engine: `POST {assetId, language}` answered by `{text}`. */
export class HttpOcrService implements OcrService {
  constructor(
    private readonly url: string,
    private readonly fetchFn: FetchLike = (input, init) => fetch(input, init)
  ) {}

  async extract(request: OcrRequest): Promise<string> {
    const response = await this.fetchFn(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ assetId: request.assetId.toString(), language: request.language })
    });
    if (!response.ok) {
      throw new Error(`OCR service responded with ${response.status}`);
    }
    const parsed = ocrResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error("OCR service returned no text");
    }
    return parsed.data.text;
  }
}
