import { describe, it, expect } from "vitest";
import { AssetId } from "./asset-id.js";
import { UserId } from "./user-id.js";
import { ValidationError } from "../error/domain-error.js";
import { addMilliseconds, coerceDate, laterOf } from "../time/time.js";

describe("AssetId", () => {
  it("throws when empty", () => {
    expect(() => AssetId.create("")).toThrow(ValidationError);
  });

  it("throws when blank", () => {
    expect(() => AssetId.create("   ")).toThrow("AssetId is empty");
  });

  it("compares by value", () => {
    expect(AssetId.create("42").equals(AssetId.reconstruct("42"))).toBe(true);
    expect(AssetId.create("42").equals(AssetId.create("43"))).toBe(false);
  });
});

describe("UserId", () => {
  it("returns value as string", () => {
    expect(UserId.create("uid_1").toString()).toBe("uid_1");
  });

  it("carries an error code", () => {
    expect(() => UserId.create("")).toThrow(expect.objectContaining({ code: "USER_ID_EMPTY" }));
  });
});

describe("time helpers", () => {
  it("coerces firestore-like timestamps", () => {
    const date = new Date("2024-01-01T00:00:00.000Z");
    expect(coerceDate({ toDate: () => date })).toBe(date);
  });

  it("coerces ISO strings and rejects garbage", () => {
    expect(coerceDate("2024-01-01T00:00:00.000Z")?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
    expect(coerceDate("not a date")).toBeNull();
    expect(coerceDate(undefined)).toBeNull();
  });

  it("adds milliseconds and picks the later date", () => {
    const base = new Date("2024-01-01T00:00:00.000Z");
    const later = addMilliseconds(base, 60_000);
    expect(later.toISOString()).toBe("2024-01-01T00:01:00.000Z");
    expect(laterOf(base, later)).toBe(later);
    expect(laterOf(later, base)).toBe(later);
  });
});
