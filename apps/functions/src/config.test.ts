import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    const config = loadConfig({});
    expect(config.leasePolicy).toEqual({
      ttlMs: 300_000,
      maxHoldMs: 12 * 60 * 60 * 1000,
      tombstoneRetentionMs: 24 * 60 * 60 * 1000
    });
    expect(config.ocr).toEqual({
      serviceUrl: "http://127.0.0.1:8089/ocr",
      defaultLanguage: "eng",
      rateLimitWindowMs: 60_000
    });
    expect(config.review).toEqual({ acceptLimit: 10, windowMs: 60_000 });
  });

  it("reads numbers from env strings", () => {
    const config = loadConfig({
      RESERVATION_TTL_SECONDS: "600",
      OCR_RATE_LIMIT_SECONDS: "0",
      OCR_DEFAULT_LANGUAGE: "deu"
    });
    expect(config.leasePolicy.ttlMs).toBe(600_000);
    expect(config.ocr.rateLimitWindowMs).toBe(0);
    expect(config.ocr.defaultLanguage).toBe("deu");
  });

  it("turns the review limit off with zero and refuses a negative one", () => {
    expect(loadConfig({ REVIEW_RATE_LIMIT: "0" }).review.acceptLimit).toBe(0);
    expect(() => loadConfig({ REVIEW_RATE_LIMIT: "-1" })).toThrow(
      expect.objectContaining({ code: "CONFIG_INVALID" })
    );
  });

  it("rejects a malformed value", () => {
    expect(() => loadConfig({ RESERVATION_TTL_SECONDS: "soon" })).toThrow(
      expect.objectContaining({ code: "CONFIG_INVALID" })
    );
  });

  it("rejects a TTL shorter than two keep-alive intervals", () => {
    expect(() => loadConfig({ RESERVATION_TTL_SECONDS: "90" })).toThrow(
      expect.objectContaining({ code: "CONFIG_INVALID" })
    );
  });
});
