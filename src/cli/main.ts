#!/usr/bin/env node
/**
 * Mutaform CLI binary entry point.
 * Loads .mutaform.yml, creates a LocalPipeline and dispatches to the
 * command router.
 */

import { loadMutaformConfig } from '../config';
import { isMutaformError } from '../shared/types';
import { run } from './index';
import { LocalPipeline } from './local-pipeline';

async function main(): Promise<void> {
  const root = process.cwd();
  const { config, warnings } = loadMutaformConfig();
  for (const warning of warnings) {
    console.error(`  ${warning.field}: ${warning.message}`);
  }

  const exitCode = await run(new LocalPipeline(root, config));
  process.exit(exitCode);
}

main().catch((err: unknown) => {
  if (isMutaformError(err)) {
    console.error(`Fatal error [${err.code}]: ${err.message}`);
  } else {
    console.error('Fatal error:', err);
  }
  process.exit(2);
});
