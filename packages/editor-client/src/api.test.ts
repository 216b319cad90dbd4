import { describe, it, expect, vi } from "vitest";
import { ApiError, createEditorApi } from "./api.js";

const respond = (status: number, body: unknown) =>
  vi.fn(async (_input: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status }));

const setup = (fetch: ReturnType<typeof respond>) =>
  createEditorApi({ baseUrl: "https://api.test/", getToken: async () => "test-token", fetch });

const asset = { assetId: "42", status: "in_progress", activeVersionId: "v1", headVersionId: "v1" };

describe("createEditorApi", () => {
  it("turns a granted reservation into dates", async () => {
    const fetch = respond(200, {
      ok: true,
      data: { assetId: "42", holder: "alice", expiresAt: "2024-01-01T00:05:00.000Z", renewed: true }
    });

    const result = await setup(fetch).reserve("42");

    expect(result).toEqual({ type: "GRANTED", expiresAt: new Date("2024-01-01T00:05:00.000Z"), renewed: true });
    expect(fetch).toHaveBeenCalledWith("https://api.test/v1/assets/42/reservation", {
      method: "POST",
      headers: { Authorization: "Bearer test-token" },
      body: undefined
    });
  });

  it("reports a 409 as a conflict with its code", async () => {
    const fetch = respond(409, { ok: false, code: "LEASE_STORE_UNAVAILABLE", message: "unavailable" });
    expect(await setup(fetch).reserve("42")).toEqual({ type: "CONFLICT", code: "LEASE_STORE_UNAVAILABLE" });
  });

  it("reports a 408 as expired", async () => {
    const fetch = respond(408, { ok: false, code: "LEASE_EXPIRED", message: "expired" });
    expect(await setup(fetch).reserve("42")).toEqual({ type: "EXPIRED" });
  });

  it("throws other reservation failures", async () => {
    const fetch = respond(500, { ok: false, code: "INTERNAL_ERROR", message: "Internal server error" });
    await expect(setup(fetch).reserve("42")).rejects.toMatchObject({ status: 500, code: "INTERNAL_ERROR" });
  });

  it("posts a save as JSON and returns the parsed result", async () => {
    const data = {
      versionId: "v2",
      submitUrl: "/v1/transcriptions/v2/submit",
      undoAvailable: true,
      redoAvailable: false,
      contributorCount: 1,
      asset: { ...asset, activeVersionId: "v2", headVersionId: "v2" }
    };
    const fetch = respond(201, { ok: true, data });

    const result = await setup(fetch).save("42", { text: "Hello", supersedes: "v1" });

    expect(result).toEqual(data);
    expect(fetch).toHaveBeenCalledWith("https://api.test/v1/assets/42/transcriptions", {
      method: "POST",
      headers: { Authorization: "Bearer test-token", "Content-Type": "application/json" },
      body: JSON.stringify({ text: "Hello", supersedes: "v1" })
    });
  });

  it("raises the server's error code", async () => {
    const fetch = respond(409, { ok: false, code: "VERSION_SUPERSEDED", message: "superseded" });
    const error = await setup(fetch)
      .submit("v1")
      .catch((caught: unknown) => caught);
    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ status: 409, code: "VERSION_SUPERSEDED", message: "superseded" });
  });

  it("rejects a response that does not match the contract", async () => {
    const fetch = respond(200, { ok: true, data: { versionId: 1 } });
    await expect(setup(fetch).review("v1", "accept")).rejects.toMatchObject({ code: "INVALID_RESPONSE" });
  });

  it("builds the release url for unload handlers", () => {
    expect(setup(respond(200, {})).releaseUrl("a/b")).toBe("https://api.test/v1/assets/a%2Fb/reservation/release");
  });
});
