/**
 * Configuration module.
 * Loads and validates runtime config from env, CLI flags, and config files.
 * Zod-validated. Defaults live in one place.
 */

export { TIMEOUTS, LIMITS, SERVER } from './defaults.js';
export { loadConfigFile, loadOptionalConfigFile } from './loader.js';
