export * as ebml from "./ebml/index.js";
export * as matroska from "./matroska/index.js";
export * from "./source/index.js";
export { Vint, leadingZeroRunLength, readId, readSignedVint, readVint, vintLength } from "./vint/index.js";
export { disableDebug, enableDebug, isDebugEnabled, setDebugLogger, type DebugCategory, type DebugLogger } from "./debug.js";
export type { CacheSourceOptions, RenderOptions } from "./config.js";
export { runDump, type DumpIO, type OpenedSource } from "./dump.js";
