export { createProgram, runCli, defaultDependencies } from "./program.js";
export type { CliDependencies } from "./program.js";
export { openMirrorSession, loadCachedCatalog } from "./session.js";
export type { MirrorSession, SessionFactory } from "./session.js";
export * from "./reporting.js";
export * from "./config/index.js";
