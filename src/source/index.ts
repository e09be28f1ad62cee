export * from "./base.js";
export * from "./buffer.js";
export * from "./cache.js";
export * from "./file.js";
export * from "./reader.js";
