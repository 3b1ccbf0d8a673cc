#!/usr/bin/env node
/**
 * sprout CLI binary
 */

import { main } from '../cli/runner.js';

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
