import { describe, it, expect } from 'vitest';
import { parseSource } from '../../../src/layers/L0-syntax-tree';
import { ARITHMETIC_OPERATORS } from '../../../src/layers/L1-operator-catalog';
import { scanSource } from '../../../src/layers/L3-site-scanner';
import { FileLock, MutationApplier, parseSingleForm, spliceSite } from '../../../src/layers/L5-mutation';
import { ERROR_CODES, type MutationSite } from '../../../src/shared/types';
import { MemorySourceStore } from '../../helpers/memory-store';

const FILE = 'src/calc.clj';
const CALC = '(ns calc)\n\n(defn add [a b]\n  ;; sum\n  (+ a, b #_(debug)))\n';

function firstSite(text = CALC): MutationSite {
  const [site] = scanSource(parseSource(FILE, text), ARITHMETIC_OPERATORS).sites;
  return site;
}

describe('spliceSite', () => {
  it('changes only the targeted node', () => {
    expect(spliceSite(CALC, firstSite())).toBe('(ns calc)\n\n(defn add [a b]\n  ;; sum\n  (- a, b #_(debug)))\n');
  });

  it('refuses text that changed since the scan', () => {
    const site = firstSite();
    expect(() => spliceSite(CALC.replace('sum', 'total'), site)).toThrow(
      expect.objectContaining({ code: ERROR_CODES.LOCATION_NOT_FOUND }),
    );
  });

  it('rejects a replacement that is not one form', () => {
    const site = { ...firstSite(), replacement: '(- a b) extra' };
    expect(() => spliceSite(CALC, site)).toThrow(`Replacement text is not a single form (${site.id})`);
  });
});

describe('parseSingleForm', () => {
  it('accepts exactly one form', () => {
    expect(parseSingleForm(' (f x) ').kind).toBe('ordered');
    expect(() => parseSingleForm('a b')).toThrow('Expected exactly one form, found 2');
    expect(() => parseSingleForm('')).toThrow('Expected exactly one form, found 0');
  });
});

describe('MutationApplier', () => {
  it('applies and reverts byte for byte', async () => {
    const store = new MemorySourceStore({ [FILE]: CALC });
    const applier = new MutationApplier(store);

    const handle = await applier.apply(firstSite());
    expect(store.files.get(FILE)).toBe(handle.mutated);
    expect(handle.original).toBe(CALC);

    await applier.revert(handle);
    expect(store.files.get(FILE)).toBe(CALC);
    expect(handle.reverted).toBe(true);
  });

  it('reverts when the scoped function throws', async () => {
    const store = new MemorySourceStore({ [FILE]: CALC });
    const applier = new MutationApplier(store);

    await expect(
      applier.withMutation(firstSite(), async () => {
        expect(store.files.get(FILE)).toContain('(- a, b');
        throw new Error('test runner blew up');
      }),
    ).rejects.toThrow('test runner blew up');
    expect(store.files.get(FILE)).toBe(CALC);
  });

  it('leaves the file untouched when the source changed since the scan', async () => {
    const site = firstSite();
    const edited = CALC.replace(';; sum', ';; total');
    const store = new MemorySourceStore({ [FILE]: edited });

    await expect(new MutationApplier(store).apply(site)).rejects.toMatchObject({
      code: ERROR_CODES.LOCATION_NOT_FOUND,
    });
    expect(store.writes).toBe(0);
    expect(store.files.get(FILE)).toBe(edited);
  });

  it('wraps read and write failures as MutationApplyFailure', async () => {
    const site = firstSite();
    await expect(new MutationApplier(new MemorySourceStore()).apply(site)).rejects.toMatchObject({
      code: ERROR_CODES.MUTATION_APPLY_FAILURE,
      message: `Could not read source file (${site.id})`,
    });

    const store = new MemorySourceStore({ [FILE]: CALC });
    store.failWritesTo = FILE;
    await expect(new MutationApplier(store).apply(site)).rejects.toMatchObject({
      code: ERROR_CODES.MUTATION_APPLY_FAILURE,
      message: `Could not write mutated source (${site.id})`,
    });
    expect(store.files.get(FILE)).toBe(CALC);
  });

  it('raises a critical RevertFailure when the original cannot be written back', async () => {
    const site = firstSite();
    const store = new MemorySourceStore({ [FILE]: CALC });

    await expect(
      new MutationApplier(store).withMutation(site, async () => {
        store.failWritesTo = FILE;
        return 'done';
      }),
    ).rejects.toMatchObject({
      code: ERROR_CODES.REVERT_FAILURE,
      severity: 'critical',
      message: `Failed to restore ${FILE} after ${site.id}`,
    });
  });

  it('swaps and restores whole-file content', async () => {
    const store = new MemorySourceStore({ [FILE]: CALC });
    const applier = new MutationApplier(store);

    const seen = await applier.withContent(FILE, '(ns compiled)\n', async () => store.files.get(FILE));
    expect(seen).toBe('(ns compiled)\n');
    expect(store.files.get(FILE)).toBe(CALC);
  });
});

describe('FileLock', () => {
  it('serializes work on one file', async () => {
    const lock = new FileLock();
    const events: string[] = [];

    const first = lock.run('a', async () => {
      events.push('first:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      events.push('first:end');
    });
    const second = lock.run('a', async () => {
      events.push('second');
    });

    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('does not block other files', async () => {
    const lock = new FileLock();
    const events: string[] = [];

    const slow = lock.run('a', async () => {
      await new Promise((resolve) => setTimeout(resolve, 10));
      events.push('a');
    });
    const fast = lock.run('b', async () => {
      events.push('b');
    });

    await Promise.all([slow, fast]);
    expect(events).toEqual(['b', 'a']);
  });

  it('releases the lock after a failure', async () => {
    const lock = new FileLock();
    await expect(lock.run('a', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(lock.run('a', async () => 'next')).resolves.toBe('next');
  });
});
