#!/usr/bin/env node
/**
 * faultpage CLI entry point
 *
 * Compiled to dist/bin/faultpage.js by TypeScript.
 * Registered as the `faultpage` binary in package.json.
 */

import 'dotenv/config';
import { createProgram } from '../cli/index.js';

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
