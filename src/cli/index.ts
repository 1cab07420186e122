/**
 * Mutaform CLI router.
 *
 * Usage:
 *   mutaform scan [files...]     List mutation sites
 *   mutaform run [--schemata]    Run mutation testing
 */

import { runScan } from './commands/scan';
import { runRun } from './commands/run';
import type { CliPipeline } from './local-pipeline';
import { getGlobalHelp, getCommandHelp } from './help';

export interface CliArgs {
  command: string;
  args: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
}

const BOOLEAN_FLAGS = ['help', 'json', 'schemata', 'full'];

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const flags: Record<string, boolean> = {};
  const options: Record<string, string> = {};

  // Skip node and script path
  const args = argv.slice(2);

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eqIdx = arg.indexOf('=');
      if (eqIdx !== -1) {
        // --key=value
        options[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        const key = arg.slice(2);
        // Known boolean flags don't consume the next arg
        if (BOOLEAN_FLAGS.includes(key)) {
          flags[key] = true;
        } else {
          options[key] = args[++i];
        }
      } else {
        flags[arg.slice(2)] = true;
      }
    } else if (arg.startsWith('-')) {
      flags[arg.slice(1)] = true;
    } else {
      positional.push(arg);
    }
  }

  return {
    command: positional[0] ?? '',
    args: positional.slice(1),
    flags,
    options,
  };
}

export async function run(
  pipeline: CliPipeline,
  argv: string[] = process.argv,
  write: (msg: string) => void = console.log,
): Promise<number> {
  const { command, args, flags } = parseArgs(argv);

  if (flags.help || flags.h) {
    if (command) {
      const cmdHelp = getCommandHelp(command);
      if (cmdHelp) {
        write(cmdHelp);
        return 0;
      }
    }
    write(getGlobalHelp());
    return 0;
  }

  switch (command) {
    case 'scan':
      return runScan(pipeline, args, !!flags.json, write);

    case 'run':
      return runRun(pipeline, {
        schemata: !!flags.schemata,
        full: !!flags.full,
        json: !!flags.json,
      }, write);

    case 'help':
    case '':
      write((args[0] && getCommandHelp(args[0])) || getGlobalHelp());
      return 0;

    default:
      write(`Unknown command: ${command}. Run \`mutaform help\` for usage.`);
      return 2;
  }
}
