import type { AssetId } from "@scriptorium/shared";

export type OcrRequest = {
  assetId: AssetId;
  language: string;
};

export interface OcrService {
  /** Resolves to the extracted text; rejects when the engine fails. */
  extract(request: OcrRequest): Promise<string>;
}
