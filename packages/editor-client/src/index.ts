export * from "./api.js";
export * from "./keep-alive.js";
export * from "./unload-release.js";
