/**
 * CLI commands index
 * Exports all command creators
 */

export { createScanCommand } from './scan.js';
export { createL10nCommand } from './l10n.js';
