#!/usr/bin/env node
/**
 * docstring-auditor binary entry point.
 */

import { run } from './index';
import { EXIT_FATAL } from '../layers/L2-reporter';

async function main(): Promise<void> {
  const exitCode = await run(process.argv);
  process.exit(exitCode);
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(EXIT_FATAL);
});
