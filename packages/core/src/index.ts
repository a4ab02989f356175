/**
 * Core module exports for @simplecas/core
 *
 * This package provides:
 * - Configuration loading (env, config files, programmatic)
 * - Scoped debug logging
 */

// Configuration System
export {
  config,
  type SimplecasConfig,
  type SimplecasConfigInput,
  type SymbolicConfig,
} from "./config.js";

// Logging
export { createLogger, type Logger } from "./logger.js";
