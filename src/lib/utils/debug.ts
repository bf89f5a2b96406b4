/**
 * Debug logging for certlens
 *
 * Enabled with the DEBUG environment variable:
 *
 * DEBUG=certlens:* - All debug output
 * DEBUG=certlens:status - Only status builder debug
 * DEBUG=certlens:crypto - Only certificate decoding debug
 * DEBUG=certlens:cli - Only CLI debug
 */

import debug from 'debug';

const createDebugger = (namespace: string) => debug(`certlens:${namespace}`);

export const debugStatus = createDebugger('status');
export const debugCrypto = createDebugger('crypto');
export const debugCli = createDebugger('cli');
