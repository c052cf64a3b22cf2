export * from "./types.js";
export * from "./progress.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./http.js";
