export * from "./batch.js";
export * from "./discovery.js";
export * from "./errors.js";
export * from "./identity.js";
export * from "./logger.js";
export * from "./manager.js";
export * from "./poller.js";
export * from "./record.js";
export * from "./templates.js";
