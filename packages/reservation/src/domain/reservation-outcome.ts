import type { Lease } from "./lease.js";

export type ReservationOutcome =
  | { type: "GRANTED"; lease: Lease; renewed: boolean }
  | { type: "CONFLICT"; reason: "HELD"; heldUntil: Date }
  | { type: "CONFLICT"; reason: "UNAVAILABLE" }
  | { type: "EXPIRED"; reason: "LAPSED" | "TOMBSTONED" };
