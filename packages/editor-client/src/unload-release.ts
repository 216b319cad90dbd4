import type { FetchLike } from "./api.js";

export type ReleaseOnUnloadOptions = {
  url: string;
  /** ID token cached by the page; unload handlers cannot wait for a fresh one. */
  token: string;
  /** `navigator.sendBeacon`, bound. */
  beacon?: (url: string, data?: string) => boolean;
  fetch?: FetchLike;
  onError?: (error: unknown) => void;
};

// Beacons cannot set headers, so the token travels in a text/plain body.
export const releaseBody = (token: string): string => JSON.stringify({ token });

/** Best-effort release on page exit; a lost request is reclaimed by lease expiry. */
export const releaseOnUnload = (options: ReleaseOnUnloadOptions): void => {
  if (options.beacon?.(options.url, releaseBody(options.token))) {
    return;
  }
  const fetchFn: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));
  void fetchFn(options.url, {
    method: "POST",
    keepalive: true,
    headers: { Authorization: `Bearer ${options.token}` }
  }).then(
    () => undefined,
    (error: unknown) => options.onError?.(error)
  );
};
