/**
 * Persisted coverage units: one JSON file per logical test unit.
 *
 *   unit "calc-test"      → <stateDir>/coverage/calc-test.json
 *   unit "api/handlers"   → <stateDir>/coverage/api--handlers.json
 *
 * Each record carries the hash of the unit's declared dependencies; a record
 * whose hash no longer matches is stale and is recomputed, never served.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { hashEntries } from '../../shared/hash';
import { createLogger } from '../../shared/logger';
import { createSemaphore } from '../../shared/semaphore';
import {
  ERROR_CODES,
  MutaformError,
  toError,
  type CoverageUnitDeclaration,
  type CoverageUnitRecord,
  type TestExecutionService,
  type TestOutcome,
  type TraceOracle,
} from '../../shared/types';
import { CoverageIndex } from './coverage-index';
import { locationKey } from '../L0-syntax-tree';

const log = createLogger({ layer: 'L2', module: 'coverage-store' });

const COVERAGE_DIR = 'coverage';

const coverageUnitRecordSchema = z.object({
  version: z.literal(1),
  unit_id: z.string().min(1),
  dependency_hash: z.string().min(1),
  tests: z.array(z.string()),
  records: z.record(z.array(z.string())),
  collected_at: z.string(),
});

export class CoverageStore {
  private readonly dir: string;

  constructor(stateDir: string) {
    this.dir = path.join(stateDir, COVERAGE_DIR);
  }

  pathFor(unitId: string): string {
    return path.join(this.dir, `${unitId.replace(/[/\\]/g, '--')}.json`);
  }

  /** Returns null when the unit was never stored or its file is unreadable. */
  load(unitId: string): CoverageUnitRecord | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.pathFor(unitId), 'utf-8');
    } catch {
      return null;
    }
    try {
      const parsed = coverageUnitRecordSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        log.warn({ unitId, issues: parsed.error.issues.length }, 'Ignoring malformed coverage record');
        return null;
      }
      return parsed.data;
    } catch (err) {
      log.warn({ unitId, err }, 'Ignoring unparseable coverage record');
      return null;
    }
  }

  /** Atomic write via rename. */
  save(record: CoverageUnitRecord): void {
    const filePath = this.pathFor(record.unit_id);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    const tmpPath = filePath + '.tmp';
    fs.writeFileSync(tmpPath, JSON.stringify(record, null, 2) + '\n');
    fs.renameSync(tmpPath, filePath);
  }
}

export function hashDependencies(
  unit: CoverageUnitDeclaration,
  read: (file: string) => string | null,
): string {
  return hashEntries([
    ...unit.dependencies.map((file): [string, string | null] => [file, read(file)]),
    ['<tests>', [...unit.tests].sort().join('\n')],
  ]);
}

export interface CoverageServices {
  oracle: TraceOracle;
  executor: TestExecutionService;
  /** Per-test bound; a test exceeding it is aborted and fails the unit */
  timeoutMs: number;
}

async function runTraced(testId: string, unitId: string, services: CoverageServices): Promise<TestOutcome> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'timeout'>((resolve) => {
    timer = setTimeout(() => resolve('timeout'), services.timeoutMs);
  });
  let settled: TestOutcome | 'timeout';
  try {
    settled = await Promise.race([
      services.executor.run(testId, { activeMutant: null, signal: controller.signal }),
      deadline,
    ]);
  } catch (err) {
    throw new MutaformError({
      code: ERROR_CODES.INDEX_STALENESS,
      severity: 'high',
      message: `Coverage collection failed for test "${testId}" in unit "${unitId}"`,
      context: { unitId, testId },
      cause: toError(err),
    });
  } finally {
    clearTimeout(timer);
  }
  if (settled === 'timeout') {
    controller.abort();
    throw new MutaformError({
      code: ERROR_CODES.INDEX_STALENESS,
      severity: 'high',
      message: `Coverage collection timed out for test "${testId}" in unit "${unitId}"`,
      context: { unitId, testId, timeoutMs: services.timeoutMs },
    });
  }
  return settled;
}

/** Run each test of a unit alone against unmutated code and record its trace. */
export async function collectUnitCoverage(
  unit: CoverageUnitDeclaration,
  dependencyHash: string,
  services: CoverageServices,
): Promise<CoverageUnitRecord> {
  const records: Record<string, string[]> = {};

  for (const testId of unit.tests) {
    await services.oracle.reset();
    const outcome = await runTraced(testId, unit.id, services);
    if (outcome !== 'pass') {
      log.warn({ unitId: unit.id, testId, outcome }, 'Test does not pass on unmutated code');
    }
    const events = await services.oracle.drain();
    const keys = new Set<string>();
    for (const event of events) {
      if (event.testId === testId) keys.add(locationKey(event.formId, event.coordinate));
    }
    records[testId] = [...keys].sort();
  }

  return {
    version: 1,
    unit_id: unit.id,
    dependency_hash: dependencyHash,
    tests: [...unit.tests],
    records,
    collected_at: new Date().toISOString(),
  };
}

export interface RefreshOptions {
  units: readonly CoverageUnitDeclaration[];
  store: CoverageStore;
  read: (file: string) => string | null;
  collect: (unit: CoverageUnitDeclaration, dependencyHash: string) => Promise<CoverageUnitRecord>;
  /** Stale units recomputed at once; 1 when they share one trace oracle */
  concurrency?: number;
}

export interface RefreshResult {
  index: CoverageIndex;
  reused: string[];
  recomputed: string[];
  /** Tests of recomputed units: their code or their own source changed */
  changedTests: Set<string>;
}

/**
 * Reuse units whose dependency hash is unchanged, recompute the rest, and
 * merge everything into one index. Work is proportional to the stale units.
 */
export async function refreshCoverage(options: RefreshOptions): Promise<RefreshResult> {
  const fresh: CoverageUnitRecord[] = [];
  const stale: Array<{ unit: CoverageUnitDeclaration; hash: string }> = [];

  for (const unit of options.units) {
    const hash = hashDependencies(unit, options.read);
    const stored = options.store.load(unit.id);
    if (stored && stored.dependency_hash === hash) {
      fresh.push(stored);
      continue;
    }
    const staleness = new MutaformError({
      code: ERROR_CODES.INDEX_STALENESS,
      severity: 'low',
      message: stored ? `Coverage unit "${unit.id}" is stale` : `Coverage unit "${unit.id}" has no stored record`,
      context: { unitId: unit.id, storedHash: stored?.dependency_hash ?? null, currentHash: hash },
    });
    log.info({ code: staleness.code, ...staleness.context }, staleness.message);
    stale.push({ unit, hash });
  }

  const semaphore = createSemaphore(options.concurrency ?? 1);

  const recomputed = await Promise.all(
    stale.map(async ({ unit, hash }) => {
      await semaphore.acquire();
      try {
        const record = await options.collect(unit, hash);
        options.store.save(record);
        return record;
      } finally {
        semaphore.release();
      }
    }),
  );

  const changedTests = new Set<string>();
  for (const record of recomputed) {
    for (const testId of record.tests) changedTests.add(testId);
  }

  return {
    index: CoverageIndex.merge(...[...fresh, ...recomputed].map((r) => CoverageIndex.fromRecords(r.records))),
    reused: fresh.map((r) => r.unit_id),
    recomputed: recomputed.map((r) => r.unit_id),
    changedTests,
  };
}
