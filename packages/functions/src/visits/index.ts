/**
 * Visit batch pipelines, reusable outside Lambda (see the local runner CLI)
 */

export * from "./invoke-model.js";
export * from "./classifier.js";
export * from "./summarizer.js";
export * from "./object-store.js";
export * from "./notifications.js";
export * from "./driver.js";
export * from "./pipelines.js";
export * from "./config.js";
export * from "./runtime.js";
