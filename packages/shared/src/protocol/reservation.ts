// Editing clients renew their lease on this cadence while the page is open.
export const KEEP_ALIVE_INTERVAL_MS = 60_000;

// A lease TTL shorter than this would expire under ordinary network jitter.
export const MIN_LEASE_TTL_MS = 2 * KEEP_ALIVE_INTERVAL_MS;
