/**
 * Command-backed test execution and reload, spawning the project's own
 * tooling through the shell.
 *
 *   runner.test_command:   "lein test :only {test}"
 *   runner.reload_command: "lein check"
 */

import { spawn } from 'child_process';
import { createLogger } from '../../shared/logger';
import type {
  ReloadOutcome,
  ReloadService,
  RunContext,
  TestExecutionService,
  TestOutcome,
} from '../../shared/types';

const log = createLogger({ layer: 'cli', module: 'command-runner' });

export const ACTIVE_MUTANT_ENV = 'MUTAFORM_ACTIVE_MUTANT';

export interface CommandOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
}

/** POSIX single-quote escaping for substituted arguments. */
export function shellQuote(value: string): string {
  if (/^[\w./:-]+$/.test(value)) return value;
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function renderTestCommand(template: string, testId: string): string {
  return template.split('{test}').join(shellQuote(testId));
}

/** Exit code of a shell command; rejects when the command cannot start or is aborted. */
function runShell(command: string, options: CommandOptions, signal?: AbortSignal): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, {
      shell: true,
      cwd: options.cwd,
      env: options.env,
      stdio: 'ignore',
      signal,
    });
    child.on('error', reject);
    child.on('close', (code) => resolve(code));
  });
}

/** Exit 0 → pass, exit 1 → fail, anything else (crash, signal) → threw. */
export function outcomeForExit(code: number | null): TestOutcome {
  if (code === 0) return 'pass';
  if (code === 1) return 'fail';
  return 'threw';
}

export class CommandTestExecutor implements TestExecutionService {
  constructor(
    private readonly template: string,
    private readonly options: CommandOptions,
  ) {}

  async run(testId: string, context: RunContext): Promise<TestOutcome> {
    const command = renderTestCommand(this.template, testId);
    const env: NodeJS.ProcessEnv = { ...process.env, ...this.options.env };
    if (context.activeMutant !== null) env[ACTIVE_MUTANT_ENV] = context.activeMutant;
    else delete env[ACTIVE_MUTANT_ENV];

    const code = await runShell(command, { cwd: this.options.cwd, env }, context.signal);
    const outcome = outcomeForExit(code);
    log.debug({ testId, code, outcome, activeMutant: context.activeMutant }, 'Test command finished');
    return outcome;
  }
}

/** Reload by running a command; with no command configured every reload succeeds. */
export class CommandReloadService implements ReloadService {
  constructor(
    private readonly command: string | undefined,
    private readonly options: CommandOptions,
  ) {}

  async reload(): Promise<ReloadOutcome> {
    if (!this.command) return 'success';
    try {
      const code = await runShell(this.command, this.options);
      return code === 0 ? 'success' : 'failure';
    } catch (err) {
      log.warn({ err, command: this.command }, 'Reload command could not be started');
      return 'failure';
    }
  }
}
