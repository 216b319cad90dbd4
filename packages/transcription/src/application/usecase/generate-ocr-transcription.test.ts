import { describe, it, expect, vi } from "vitest";
import { AssetId, ConflictError, UserId } from "@scriptorium/shared";
import type { EditLease } from "../port/edit-lease.js";
import type { RateLimiter } from "../port/rate-limiter.js";
import { TranscriptionChain } from "../transcription-chain.js";
import { InMemoryTranscriptionRepository } from "../../infra/memory/in-memory-transcription-repository.js";
import { GenerateOcrTranscription } from "./generate-ocr-transcription.js";
import { SaveTranscription } from "./save-transcription.js";
import { VersionId } from "../../domain/value/version-id.js";
import type { TranscriptionCommit } from "../port/transcription-repository.js";

class RacingRepository extends InMemoryTranscriptionRepository {
  readonly commits: TranscriptionCommit[] = [];

  async commit(commit: TranscriptionCommit): Promise<void> {
    this.commits.push(commit);
    throw new ConflictError("CONCURRENT_UPDATE", "The transcription changed while you were editing");
  }
}

const assetId = AssetId.create("42");
const alice = UserId.create("alice");
const now = new Date("2024-01-01T00:00:00.000Z");

const openLease: EditLease = {
  requireLease: async () => undefined,
  releaseAll: async () => undefined
};

const setup = (retryAfterSeconds = 0, repo = new InMemoryTranscriptionRepository()) => {
  const chain = new TranscriptionChain(repo);
  const extract = vi.fn(async () => "Recognised text");
  const attempt = vi.fn(async () => retryAfterSeconds);
  const limiter: RateLimiter = { attempt };
  const usecase = new GenerateOcrTranscription(chain, openLease, { extract }, limiter, {
    defaultLanguage: "eng",
    rateLimitWindowMs: 60_000
  });
  return { repo, chain, extract, attempt, usecase };
};

describe("GenerateOcrTranscription", () => {
  it("lays a blank system version under OCR text on a new asset", async () => {
    const { usecase, chain, extract, attempt } = setup();

    const result = await usecase.execute({ assetId, actor: alice, supersedes: null, now });

    expect(extract).toHaveBeenCalledWith({ assetId, language: "eng" });
    expect(attempt).toHaveBeenCalledWith("ocr:42", { windowMs: 60_000, maxCalls: 1 }, now);
    expect(result.version.getText()).toBe("Recognised text");
    expect(result.version.isOcrGenerated()).toBe(true);
    expect(result.version.getAuthor().toString()).toBe("alice");
    expect(result.undoAvailable).toBe(true);
    expect(result.redoAvailable).toBe(false);
    expect(result.contributorCount).toBe(1);

    const authors: string[] = [];
    for await (const version of chain.history(assetId)) {
      authors.push(version.getAuthor().toString());
    }
    expect(authors).toEqual(["alice", "system"]);
  });

  it("builds on the active version and passes the requested language", async () => {
    const { usecase, chain, extract } = setup();
    const v1 = await chain.append(assetId, { author: alice, text: "typed", supersedes: null }, now);

    const result = await usecase.execute({
      assetId,
      actor: alice,
      language: "deu",
      supersedes: v1.getVersionId(),
      now
    });

    expect(extract).toHaveBeenCalledWith({ assetId, language: "deu" });
    expect(result.version.getSupersedes()?.toString()).toBe("v1");
  });

  it("marks a later save as derived from OCR", async () => {
    const { usecase, chain } = setup();
    const ocr = await usecase.execute({ assetId, actor: alice, supersedes: null, now });
    const save = new SaveTranscription(chain, openLease);

    const edited = await save.execute({
      assetId,
      author: alice,
      text: "Recognised text, fixed",
      supersedes: ocr.version.getVersionId(),
      now
    });

    expect(edited.version.isOcrOriginated()).toBe(true);
  });

  it("surfaces the rate limit without calling the engine", async () => {
    const { usecase, extract } = setup(42);

    await expect(usecase.execute({ assetId, actor: alice, supersedes: null, now })).rejects.toMatchObject({
      code: "RATE_LIMITED",
      retryAfterSeconds: 42
    });
    expect(extract).not.toHaveBeenCalled();
  });

  it("leaves the chain untouched when the engine fails", async () => {
    const { usecase, extract, repo } = setup();
    extract.mockRejectedValueOnce(new Error("engine down"));

    await expect(usecase.execute({ assetId, actor: alice, supersedes: null, now })).rejects.toMatchObject({
      code: "OCR_UNAVAILABLE"
    });
    expect(await repo.listByAsset(assetId)).toEqual([]);
  });

  it("rejects a stale supersedes before running OCR", async () => {
    const { usecase, extract, chain } = setup();
    await chain.append(assetId, { author: alice, text: "typed", supersedes: null }, now);

    await expect(
      usecase.execute({ assetId, actor: alice, supersedes: VersionId.create("old"), now })
    ).rejects.toMatchObject({ code: "VERSION_SUPERSEDED" });
    expect(extract).not.toHaveBeenCalled();
  });

  it("writes the blank base and the OCR text in one commit", async () => {
    const repo = new RacingRepository();
    const { usecase, chain } = setup(0, repo);

    await expect(usecase.execute({ assetId, actor: alice, supersedes: null, now })).rejects.toMatchObject({
      code: "CONCURRENT_UPDATE"
    });
    expect(repo.commits.length).toBe(1);
    expect(repo.commits[0]?.append.map((version) => version.getAuthor().toString())).toEqual(["system", "alice"]);
    expect((await chain.load(assetId)).getStatus()).toBe("not_started");
    expect(await repo.listByAsset(assetId)).toEqual([]);
  });
});
