/**
 * @health-export/connector
 *
 * Fitbit Web API connector: retrieval, normalization and CSV export.
 */

// Re-export services as namespaces to avoid conflicts
export * as fitbit from "./services/fitbit/index.js";

// Re-export lib utilities
export * from "./lib/logger.js";
export * from "./lib/errors.js";
export * from "./lib/config.js";
