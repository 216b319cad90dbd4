import { describe, it, expect } from "vitest";
import { AssetId, UserId } from "@scriptorium/shared";
import { TranscriptionChain } from "./transcription-chain.js";
import { InMemoryTranscriptionRepository } from "../infra/memory/in-memory-transcription-repository.js";
import { AssetTranscription } from "../domain/entity/asset-transcription.js";
import { SYSTEM_AUTHOR, TranscriptionVersion } from "../domain/entity/transcription-version.js";
import { VersionId } from "../domain/value/version-id.js";

const assetId = AssetId.create("42");
const alice = UserId.create("alice");
const bob = UserId.create("bob");
const now = new Date("2024-01-01T00:00:00.000Z");

const ids = async (versions: AsyncIterable<TranscriptionVersion>): Promise<string[]> => {
  const out: string[] = [];
  for await (const version of versions) {
    out.push(version.getVersionId().toString());
  }
  return out;
};

const setup = () => {
  const repo = new InMemoryTranscriptionRepository();
  return { repo, chain: new TranscriptionChain(repo) };
};

describe("TranscriptionChain", () => {
  it("treats an unknown asset as not started", async () => {
    const { chain } = setup();
    expect((await chain.load(assetId)).getStatus()).toBe("not_started");
    expect(await chain.active(assetId)).toBeNull();
    expect(await ids(chain.history(assetId))).toEqual([]);
  });

  it("appends and walks history most recent first, every time it is iterated", async () => {
    const { chain } = setup();
    const v1 = await chain.append(assetId, { author: alice, text: "Hello", supersedes: null }, now);
    await chain.append(assetId, { author: alice, text: "Hello world", supersedes: v1.getVersionId() }, now);

    const history = chain.history(assetId);
    expect(await ids(history)).toEqual(["v2", "v1"]);
    expect(await ids(history)).toEqual(["v2", "v1"]);
    expect((await chain.active(assetId))?.getText()).toBe("Hello world");
  });

  it("undoes and redoes along the branch", async () => {
    const { chain } = setup();
    const v1 = await chain.append(assetId, { author: alice, text: "a", supersedes: null }, now);
    const v2 = await chain.append(assetId, { author: alice, text: "b", supersedes: v1.getVersionId() }, now);
    await chain.append(assetId, { author: alice, text: "c", supersedes: v2.getVersionId() }, now);

    await chain.undo(assetId, now);
    await chain.undo(assetId, now);
    expect(await ids(chain.history(assetId))).toEqual(["v1"]);

    await chain.redo(assetId, now);
    expect((await chain.active(assetId))?.getText()).toBe("b");
    await chain.redo(assetId, now);
    expect((await chain.active(assetId))?.getText()).toBe("c");

    await expect(chain.redo(assetId, now)).rejects.toMatchObject({ code: "NO_NEXT_VERSION" });
  });

  it("keeps the abandoned branch stored after a fork", async () => {
    const { chain, repo } = setup();
    const v1 = await chain.append(assetId, { author: alice, text: "a", supersedes: null }, now);
    await chain.append(assetId, { author: alice, text: "b", supersedes: v1.getVersionId() }, now);
    await chain.undo(assetId, now);
    await chain.append(assetId, { author: alice, text: "c", supersedes: v1.getVersionId() }, now);

    expect(await ids(chain.history(assetId))).toEqual(["v3", "v1"]);
    expect((await repo.listByAsset(assetId)).length).toBe(3);
    const snapshot = await chain.snapshot(assetId);
    expect(snapshot.undoAvailable).toBe(true);
    expect(snapshot.redoAvailable).toBe(false);
    await expect(chain.redo(assetId, now)).rejects.toMatchObject({ code: "NO_NEXT_VERSION" });
  });

  it("rejects a stale append without storing a version", async () => {
    const { chain, repo } = setup();
    await chain.append(assetId, { author: alice, text: "a", supersedes: null }, now);
    await expect(
      chain.append(assetId, { author: bob, text: "b", supersedes: null }, now)
    ).rejects.toMatchObject({ code: "VERSION_SUPERSEDED" });
    expect((await repo.listByAsset(assetId)).length).toBe(1);
  });

  it("lets only one of two racing appends commit", async () => {
    const { chain, repo } = setup();
    const results = await Promise.allSettled([
      chain.append(assetId, { author: alice, text: "a", supersedes: null }, now),
      chain.append(assetId, { author: bob, text: "b", supersedes: null }, now)
    ]);

    expect(results.filter((result) => result.status === "fulfilled").length).toBe(1);
    const rejected = results.find((result) => result.status === "rejected");
    expect(rejected).toMatchObject({ reason: { code: "CONCURRENT_UPDATE" } });
    expect((await repo.listByAsset(assetId)).length).toBe(1);
  });

  it("counts distinct human authors and reviewers", async () => {
    const { chain, repo } = setup();
    const blank = await chain.append(assetId, { author: SYSTEM_AUTHOR, text: "", supersedes: null }, now);
    const v2 = await chain.append(assetId, { author: alice, text: "a", supersedes: blank.getVersionId() }, now);
    const asset = await chain.load(assetId);
    const submitted = await chain.apply(asset, { type: "submit", actor: alice, version: v2 }, now);
    const stamped = await chain.requireVersion(v2.getVersionId());
    await chain.apply(submitted, { type: "reject", reviewer: bob, version: stamped }, now);
    await chain.append(
      assetId,
      { author: alice, text: "b", supersedes: v2.getVersionId() },
      now
    );

    expect(await chain.contributorCount(assetId)).toBe(2);
    expect((await repo.findVersion(v2.getVersionId()))?.getReviewedBy()?.toString()).toBe("bob");
  });

  it("fails on a cycle instead of walking forever", async () => {
    const { chain, repo } = setup();
    const a = VersionId.create("a");
    const b = VersionId.create("b");
    const version = (id: VersionId, supersedes: VersionId) =>
      TranscriptionVersion.create({
        versionId: id,
        assetId,
        text: id.toString(),
        author: alice,
        supersedes,
        ocrGenerated: false,
        ocrOriginated: false,
        now
      });
    repo.seedVersion(version(a, b));
    repo.seedVersion(version(b, a));
    repo.seedAsset(
      AssetTranscription.reconstruct({
        assetId,
        status: "in_progress",
        activeVersionId: a,
        headVersionId: a,
        revision: 2,
        updatedAt: now
      })
    );

    await expect(ids(chain.history(assetId))).rejects.toMatchObject({ code: "CHAIN_CORRUPT" });
  });

  it("reports an unknown version as not found", async () => {
    const { chain } = setup();
    await expect(chain.requireVersion(VersionId.create("nope"))).rejects.toMatchObject({
      code: "VERSION_NOT_FOUND"
    });
  });
});
