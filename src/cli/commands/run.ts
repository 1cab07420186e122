/**
 * `mutaform run`: execute the mutation pipeline and report.
 *
 * Exit codes: 0 no survivors, 1 at least one surviving mutant.
 */

import type { CliPipeline } from '../local-pipeline';
import { formatRunReport } from '../output';

export interface RunCommandOptions {
  schemata: boolean;
  full: boolean;
  json: boolean;
}

export async function runRun(
  pipeline: CliPipeline,
  options: RunCommandOptions,
  write: (msg: string) => void = console.log,
): Promise<number> {
  if (!options.json) write('Mutaform: Running mutation tests...');

  const report = await pipeline.run({ schemata: options.schemata, full: options.full });

  if (options.json) {
    write(JSON.stringify(report, null, 2));
  } else {
    write(formatRunReport(report));
  }
  return report.counts.survived > 0 ? 1 : 0;
}
