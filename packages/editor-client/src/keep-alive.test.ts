import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { KeepAliveLoop } from "./keep-alive.js";
import type { ReserveResult } from "./api.js";

const granted: ReserveResult = { type: "GRANTED", expiresAt: new Date("2024-01-01T00:05:00.000Z"), renewed: true };
const conflict: ReserveResult = { type: "CONFLICT", code: "LEASE_HELD" };
const expired: ReserveResult = { type: "EXPIRED" };

const setup = () => {
  const reserve = vi.fn<(assetId: string) => Promise<ReserveResult>>();
  const callbacks = {
    onGranted: vi.fn(),
    onConflict: vi.fn(),
    onExpired: vi.fn(),
    onTransientError: vi.fn()
  };
  const loop = new KeepAliveLoop({ api: { reserve }, assetId: "42", intervalMs: 1000, ...callbacks });
  return { reserve, loop, ...callbacks };
};

describe("KeepAliveLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("reserves at once and then on every interval", async () => {
    const { reserve, loop, onGranted } = setup();
    reserve.mockResolvedValue(granted);

    loop.start();
    expect(reserve).toHaveBeenCalledWith("42");
    await vi.advanceTimersByTimeAsync(0);
    expect(onGranted).toHaveBeenCalledWith(granted);

    await vi.advanceTimersByTimeAsync(999);
    expect(reserve).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(reserve).toHaveBeenCalledTimes(2);
    loop.stop();
  });

  it("stops on conflict", async () => {
    const { reserve, loop, onConflict } = setup();
    reserve.mockResolvedValue(conflict);

    loop.start();
    await vi.advanceTimersByTimeAsync(5000);

    expect(onConflict).toHaveBeenCalledWith(conflict);
    expect(reserve).toHaveBeenCalledTimes(1);
    expect(loop.isRunning()).toBe(false);
  });

  it("re-acquires immediately after its own lease expired", async () => {
    const { reserve, loop, onExpired, onGranted, onConflict } = setup();
    reserve.mockResolvedValueOnce(expired).mockResolvedValue(granted);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(onExpired).toHaveBeenCalledTimes(1);
    expect(reserve).toHaveBeenCalledTimes(2);
    expect(onGranted).toHaveBeenCalledTimes(1);
    expect(onConflict).not.toHaveBeenCalled();
    expect(loop.isRunning()).toBe(true);
    loop.stop();
  });

  it("degrades to conflict when the re-acquire fails", async () => {
    const { reserve, loop, onConflict } = setup();
    reserve.mockResolvedValueOnce(expired).mockResolvedValueOnce(conflict);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(onConflict).toHaveBeenCalledWith(conflict);
    expect(loop.isRunning()).toBe(false);
  });

  it("treats a second expiry as a conflict", async () => {
    const { reserve, loop, onConflict } = setup();
    reserve.mockResolvedValue(expired);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(onConflict).toHaveBeenCalledWith({ type: "CONFLICT", code: "LEASE_EXPIRED" });
    expect(loop.isRunning()).toBe(false);
  });

  it("keeps ticking through transient failures", async () => {
    const { reserve, loop, onTransientError, onGranted } = setup();
    const offline = new Error("offline");
    reserve.mockRejectedValueOnce(offline).mockResolvedValue(granted);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(onTransientError).toHaveBeenCalledWith(offline);

    await vi.advanceTimersByTimeAsync(1000);
    expect(reserve).toHaveBeenCalledTimes(2);
    expect(onGranted).toHaveBeenCalledTimes(1);
    loop.stop();
  });

  it("runs nothing after stop", async () => {
    const { reserve, loop } = setup();
    reserve.mockResolvedValue(granted);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    loop.stop();
    await vi.advanceTimersByTimeAsync(5000);

    expect(reserve).toHaveBeenCalledTimes(1);
  });

  it("ignores a response that arrives after stop", async () => {
    const { reserve, loop, onGranted } = setup();
    let resolve: (value: ReserveResult) => void = () => undefined;
    reserve.mockImplementationOnce(
      () =>
        new Promise<ReserveResult>((done) => {
          resolve = done;
        })
    );

    loop.start();
    loop.stop();
    resolve(granted);
    await vi.advanceTimersByTimeAsync(5000);

    expect(onGranted).not.toHaveBeenCalled();
    expect(reserve).toHaveBeenCalledTimes(1);
  });
});
