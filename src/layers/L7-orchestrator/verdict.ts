import { createLogger } from '../../shared/logger';
import { createSemaphore } from '../../shared/semaphore';
import {
  ERROR_CODES,
  MutaformError,
  toError,
  type TestExecutionService,
  type TestOutcome,
  type Verdict,
  type VerdictCounts,
  type VerdictState,
} from '../../shared/types';

const log = createLogger({ layer: 'L7', module: 'verdict' });

/**
 * One verdict per site: `pending` moves to exactly one terminal verdict and
 * is never revisited.
 */
export class VerdictTracker {
  private readonly states = new Map<string, VerdictState>();

  register(siteId: string): void {
    if (this.states.has(siteId)) {
      throw new MutaformError({
        code: ERROR_CODES.VERDICT_TRANSITION,
        severity: 'high',
        message: `Site ${siteId} is already tracked`,
        context: { siteId },
      });
    }
    this.states.set(siteId, 'pending');
  }

  state(siteId: string): VerdictState | undefined {
    return this.states.get(siteId);
  }

  settle(siteId: string, verdict: Verdict): void {
    const current = this.states.get(siteId);
    if (current !== 'pending') {
      throw new MutaformError({
        code: ERROR_CODES.VERDICT_TRANSITION,
        severity: 'high',
        message: `Illegal verdict transition for ${siteId}: ${current ?? 'untracked'} → ${verdict}`,
        context: { siteId, from: current ?? null, to: verdict },
      });
    }
    this.states.set(siteId, verdict);
  }

  pending(): string[] {
    return [...this.states].filter(([, state]) => state === 'pending').map(([id]) => id);
  }
}

export function emptyCounts(): VerdictCounts {
  return { killed: 0, survived: 0, 'no-coverage': 0, timeout: 0, error: 0 };
}

export function countVerdicts(verdicts: Iterable<Verdict>): VerdictCounts {
  const counts = emptyCounts();
  for (const verdict of verdicts) counts[verdict]++;
  return counts;
}

/** killed / (killed + survived); timeouts, errors and uncovered sites are out. */
export function mutationScore(counts: VerdictCounts): number | null {
  const denominator = counts.killed + counts.survived;
  return denominator === 0 ? null : counts.killed / denominator;
}

export interface TestPhaseOptions {
  tests: readonly string[];
  executor: TestExecutionService;
  activeMutant: string | null;
  /** Bound on each test invocation */
  timeoutMs: number;
  concurrency: number;
}

export interface TestPhaseResult {
  verdict: Exclude<Verdict, 'no-coverage'>;
  decisiveTest?: string;
  detail?: string;
  outcomes: Record<string, TestOutcome>;
}

type Settled = { kind: 'outcome'; outcome: TestOutcome } | { kind: 'rejected'; error: Error } | { kind: 'aborted' };

/**
 * Run the covering tests of one mutant. The first failing test kills it and
 * aborts the rest; a test exceeding `timeoutMs` aborts the rest and yields
 * `timeout`; a test whose invocation rejects yields `error`.
 */
export async function runTestPhase(options: TestPhaseOptions): Promise<TestPhaseResult> {
  const controller = new AbortController();
  const { signal } = controller;
  const aborted = new Promise<Settled>((resolve) => {
    signal.addEventListener('abort', () => resolve({ kind: 'aborted' }), { once: true });
  });
  const semaphore = createSemaphore(Math.max(1, options.concurrency));
  const outcomes: Record<string, TestOutcome> = {};

  let killedBy: string | undefined;
  let timedOut: string | undefined;
  let failed: { testId: string; error: Error } | undefined;

  const runOne = async (testId: string): Promise<void> => {
    await semaphore.acquire();
    try {
      if (signal.aborted) return;
      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<Settled>((resolve) => {
        timer = setTimeout(() => resolve({ kind: 'aborted' }), options.timeoutMs);
      });
      const invocation = Promise.resolve()
        .then(() => options.executor.run(testId, { activeMutant: options.activeMutant, signal }))
        .then(
          (outcome): Settled => ({ kind: 'outcome', outcome }),
          (err: unknown): Settled => ({ kind: 'rejected', error: toError(err) }),
        );

      let settled: Settled;
      try {
        settled = await Promise.race([invocation, aborted, deadline]);
      } finally {
        clearTimeout(timer);
      }

      if (settled.kind === 'aborted') {
        if (!signal.aborted) {
          timedOut ??= testId;
          log.debug({ testId, timeoutMs: options.timeoutMs }, 'Test exceeded its time bound');
          controller.abort();
        }
        return;
      }
      if (settled.kind === 'rejected') {
        failed ??= { testId, error: settled.error };
        controller.abort();
        return;
      }
      outcomes[testId] = settled.outcome;
      if (settled.outcome !== 'pass') {
        killedBy ??= testId;
        controller.abort();
      }
    } finally {
      semaphore.release();
    }
  };

  await Promise.all(options.tests.map(runOne));

  if (killedBy !== undefined) return { verdict: 'killed', decisiveTest: killedBy, outcomes };
  if (timedOut !== undefined) {
    return { verdict: 'timeout', decisiveTest: timedOut, detail: `exceeded ${options.timeoutMs}ms`, outcomes };
  }
  if (failed !== undefined) {
    return { verdict: 'error', decisiveTest: failed.testId, detail: failed.error.message, outcomes };
  }
  return { verdict: 'survived', outcomes };
}
