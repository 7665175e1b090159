/**
 * @resonance/node — Public API.
 *
 * @packageDocumentation
 */

export { ReconcilerContext, DEGRADED_AFTER_FAILURES } from "./services/reconciler-context.js";
export type { ReconcilerDeps, Readiness } from "./services/reconciler-context.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
