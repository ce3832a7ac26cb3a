export * from "./actions.js";
export * from "./configuration.js";
export * from "./correlation.js";
export * from "./dispatcher.js";
export * from "./envelope.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./scheduler.js";
export * from "./session.js";
export * from "./validator.js";
