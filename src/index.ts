#!/usr/bin/env node
/**
 * sdstatus
 * Reports metadata and localization coverage of SecureDrop sites
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
