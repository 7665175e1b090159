/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createMarkerRoutes } from "./markers.js";
export { createStatusRoutes } from "./status.js";
export { createWatcherRoutes } from "./watcher.js";
export { createCommitmentRoutes, createProofRoutes } from "./commitments.js";
export { createSupplyRoutes } from "./supply.js";
