export * from "./core/index.js";
export * from "./config.js";
export * from "./engine.js";
export * from "./logger.js";
