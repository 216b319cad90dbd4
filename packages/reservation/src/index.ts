export * from "./domain/lease.js";
export * from "./domain/lease-policy.js";
export * from "./domain/reservation-outcome.js";
export * from "./application/port/lease-store.js";
export * from "./application/reservation-manager.js";
export * from "./application/usecase/sweep-leases.js";
export * from "./infra/memory/in-memory-lease-store.js";
export * from "./infra/firebase/firestore-lease-store.js";
export * from "./infra/firebase/lease-firestore-mapper.js";
