export * from "./data.js";
export * from "./element.js";
export * from "./errors.js";
export * from "./parser.js";
export * from "./registry.js";
export * from "./render.js";
export * from "./view.js";
