export * from "./constants.js";
export * from "./settings.js";
