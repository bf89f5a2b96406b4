/**
 * certlens - status aggregation and rendering for cert-manager Certificates
 *
 * Main entry point
 */

export * from './lib/index.js';
export { setLogger, logWarn } from './logger.js';
