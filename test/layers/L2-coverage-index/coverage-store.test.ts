import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  CoverageStore,
  collectUnitCoverage,
  hashDependencies,
  refreshCoverage,
} from '../../../src/layers/L2-coverage-index';
import {
  ERROR_CODES,
  type CoverageUnitDeclaration,
  type CoverageUnitRecord,
  type TestExecutionService,
  type TraceEvent,
  type TraceOracle,
} from '../../../src/shared/types';

class BufferOracle implements TraceOracle {
  events: TraceEvent[] = [];
  resets = 0;

  reset(): void {
    this.resets++;
    this.events = [];
  }

  drain(): TraceEvent[] {
    const out = this.events;
    this.events = [];
    return out;
  }
}

const UNIT: CoverageUnitDeclaration = {
  id: 'calc-test',
  tests: ['calc-test/add', 'calc-test/neg'],
  dependencies: ['src/calc.clj', 'test/calc_test.clj'],
};

function record(unitId: string, hash: string): CoverageUnitRecord {
  return {
    version: 1,
    unit_id: unitId,
    dependency_hash: hash,
    tests: ['t'],
    records: { t: ['src/a.clj::defn f|3'] },
    collected_at: '2026-01-01T00:00:00.000Z',
  };
}

describe('CoverageStore', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mutaform-coverage-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('stores one file per unit, flattening slashes', () => {
    const store = new CoverageStore(tmpDir);
    expect(store.pathFor('api/handlers')).toBe(path.join(tmpDir, 'coverage', 'api--handlers.json'));
  });

  it('round-trips a record', () => {
    const store = new CoverageStore(tmpDir);
    store.save(record('u1', 'abc'));
    expect(store.load('u1')).toEqual(record('u1', 'abc'));
    expect(fs.existsSync(store.pathFor('u1') + '.tmp')).toBe(false);
  });

  it('returns null for missing, unparseable or malformed records', () => {
    const store = new CoverageStore(tmpDir);
    expect(store.load('missing')).toBeNull();

    fs.mkdirSync(path.join(tmpDir, 'coverage'), { recursive: true });
    fs.writeFileSync(store.pathFor('broken'), '{not json');
    expect(store.load('broken')).toBeNull();

    fs.writeFileSync(store.pathFor('wrong'), JSON.stringify({ version: 2 }));
    expect(store.load('wrong')).toBeNull();
  });
});

describe('hashDependencies', () => {
  const files: Record<string, string> = { 'src/calc.clj': '(ns calc)', 'test/calc_test.clj': '(ns calc-test)' };
  const read = (file: string) => files[file] ?? null;

  it('changes when a dependency changes', () => {
    const before = hashDependencies(UNIT, read);
    const after = hashDependencies(UNIT, (file) => (file === 'src/calc.clj' ? '(ns calc) (def x 1)' : read(file)));
    expect(after).not.toBe(before);
  });

  it('ignores the order of tests and dependencies', () => {
    const reordered = { ...UNIT, tests: [...UNIT.tests].reverse(), dependencies: [...UNIT.dependencies].reverse() };
    expect(hashDependencies(reordered, read)).toBe(hashDependencies(UNIT, read));
  });

  it('distinguishes a missing dependency from an empty one', () => {
    expect(hashDependencies(UNIT, () => null)).not.toBe(hashDependencies(UNIT, () => ''));
  });
});

describe('collectUnitCoverage', () => {
  it('records each test alone from its own trace events', async () => {
    const oracle = new BufferOracle();
    const executor: TestExecutionService = {
      run: async (testId) => {
        oracle.events.push(
          { testId, formId: 'src/calc.clj::defn add', coordinate: '3' },
          { testId, formId: 'src/calc.clj::defn add', coordinate: '3' },
          { testId: 'someone-else', formId: 'src/calc.clj::defn neg?', coordinate: '3' },
        );
        if (testId === 'calc-test/neg') {
          oracle.events.push({ testId, formId: 'src/calc.clj::defn neg?', coordinate: '3' });
        }
        return 'pass';
      },
    };

    const result = await collectUnitCoverage(UNIT, 'hash-1', { oracle, executor, timeoutMs: 1000 });

    expect(oracle.resets).toBe(2);
    expect(result).toMatchObject({
      version: 1,
      unit_id: 'calc-test',
      dependency_hash: 'hash-1',
      tests: ['calc-test/add', 'calc-test/neg'],
      records: {
        'calc-test/add': ['src/calc.clj::defn add|3'],
        'calc-test/neg': ['src/calc.clj::defn add|3', 'src/calc.clj::defn neg?|3'],
      },
    });
  });

  it('fails with IndexStaleness when a test cannot run', async () => {
    const executor: TestExecutionService = { run: () => Promise.reject(new Error('no runner')) };
    await expect(collectUnitCoverage(UNIT, 'h', { oracle: new BufferOracle(), executor, timeoutMs: 1000 })).rejects.toMatchObject({
      code: ERROR_CODES.INDEX_STALENESS,
      message: 'Coverage collection failed for test "calc-test/add" in unit "calc-test"',
    });
  });

  it('aborts and fails a test that exceeds the time bound', async () => {
    let aborted = false;
    const executor: TestExecutionService = {
      run: (_testId, { signal }) =>
        new Promise((resolve) => {
          signal.addEventListener('abort', () => {
            aborted = true;
            resolve('pass');
          });
        }),
    };
    await expect(
      collectUnitCoverage(UNIT, 'h', { oracle: new BufferOracle(), executor, timeoutMs: 20 }),
    ).rejects.toMatchObject({
      code: ERROR_CODES.INDEX_STALENESS,
      message: 'Coverage collection timed out for test "calc-test/add" in unit "calc-test"',
      context: { unitId: 'calc-test', testId: 'calc-test/add', timeoutMs: 20 },
    });
    expect(aborted).toBe(true);
  });
});

describe('refreshCoverage', () => {
  let tmpDir: string;
  let files: Record<string, string>;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mutaform-refresh-'));
    files = { 'src/a.clj': '(ns a)', 'src/b.clj': '(ns b)' };
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  const units: CoverageUnitDeclaration[] = [
    { id: 'a-test', tests: ['a-test/one'], dependencies: ['src/a.clj'] },
    { id: 'b-test', tests: ['b-test/one', 'b-test/two'], dependencies: ['src/b.clj'] },
  ];

  function collector() {
    return vi.fn(async (unit: CoverageUnitDeclaration, hash: string): Promise<CoverageUnitRecord> => ({
      version: 1,
      unit_id: unit.id,
      dependency_hash: hash,
      tests: unit.tests,
      records: Object.fromEntries(unit.tests.map((t) => [t, [`src/${unit.id[0]}.clj::ns ${unit.id[0]}|`]])),
      collected_at: '2026-01-01T00:00:00.000Z',
    }));
  }

  function refresh(collect: ReturnType<typeof collector>) {
    return refreshCoverage({
      units,
      store: new CoverageStore(tmpDir),
      read: (file) => files[file] ?? null,
      collect,
    });
  }

  it('collects every unit on the first run', async () => {
    const collect = collector();
    const result = await refresh(collect);
    expect(collect).toHaveBeenCalledTimes(2);
    expect(result.recomputed).toEqual(['a-test', 'b-test']);
    expect(result.reused).toEqual([]);
    expect([...result.changedTests]).toEqual(['a-test/one', 'b-test/one', 'b-test/two']);
    expect([...result.index.testsFor('src/b.clj::ns b', '')].sort()).toEqual(['b-test/one', 'b-test/two']);
  });

  it('reuses units whose dependencies are unchanged', async () => {
    await refresh(collector());
    const collect = collector();
    const result = await refresh(collect);
    expect(collect).not.toHaveBeenCalled();
    expect(result.reused).toEqual(['a-test', 'b-test']);
    expect(result.changedTests.size).toBe(0);
    expect(result.index.tests()).toEqual(['a-test/one', 'b-test/one', 'b-test/two']);
  });

  it('recomputes only the unit whose dependency changed', async () => {
    await refresh(collector());
    files['src/a.clj'] = '(ns a) (defn f [] 1)';
    const collect = collector();
    const result = await refresh(collect);
    expect(collect).toHaveBeenCalledTimes(1);
    expect(result.recomputed).toEqual(['a-test']);
    expect(result.reused).toEqual(['b-test']);
    expect([...result.changedTests]).toEqual(['a-test/one']);
  });
});
