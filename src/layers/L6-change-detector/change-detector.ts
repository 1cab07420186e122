import { createLogger } from '../../shared/logger';
import type { EquivalentSite, SiteResult } from '../../shared/types';
import type { Form } from '../L0-syntax-tree';

const log = createLogger({ layer: 'L6', module: 'change-detector' });

export interface FormDigestEntry {
  file: string;
  digest: string;
  start_line: number;
  /** Sorted ids of the tests that covered the form when it was digested */
  tests: string[];
}

/** formId → digest entry for every form of one run. */
export type DigestTable = Record<string, FormDigestEntry>;

export interface ChangeSet {
  changed: string[];
  unchanged: string[];
  /** Forms of the previous run that no longer exist */
  removed: string[];
}

export interface DetectOptions {
  /** Digest table of the previous run; null means everything is new */
  previous: DigestTable | null;
  current: DigestTable;
  /** Tests whose own source or dependencies changed since the previous run */
  changedTests: ReadonlySet<string>;
  testsForForm: (formId: string) => ReadonlySet<string>;
}

const NO_TESTS: ReadonlySet<string> = new Set();

export function digestForms(
  forms: readonly Form[],
  testsFor: (form: Form) => ReadonlySet<string> = () => NO_TESTS,
): DigestTable {
  const table: DigestTable = {};
  for (const form of forms) {
    table[form.id] = {
      file: form.file,
      digest: form.digest,
      start_line: form.startLine,
      tests: [...testsFor(form)].sort(),
    };
  }
  return table;
}

function sameTests(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((testId, i) => testId === b[i]);
}

/**
 * Partition current forms into changed and unchanged. A form is changed when
 * it is new, its digest differs, it moved to another file, the set of tests
 * covering it differs, or any test that covers it changed. Forms only
 * present in `previous` are removed.
 */
export function detectChanges(options: DetectOptions): ChangeSet {
  const { previous, current, changedTests, testsForForm } = options;
  const changed: string[] = [];
  const unchanged: string[] = [];

  for (const [formId, entry] of Object.entries(current)) {
    const before = previous?.[formId];
    if (
      !before ||
      before.digest !== entry.digest ||
      before.file !== entry.file ||
      !sameTests(before.tests, entry.tests)
    ) {
      changed.push(formId);
      continue;
    }
    let testChanged = false;
    for (const testId of testsForForm(formId)) {
      if (changedTests.has(testId)) {
        testChanged = true;
        break;
      }
    }
    (testChanged ? changed : unchanged).push(formId);
  }

  const removed = previous ? Object.keys(previous).filter((formId) => !(formId in current)) : [];
  const result = { changed: changed.sort(), unchanged: unchanged.sort(), removed: removed.sort() };
  log.debug(
    { changed: result.changed.length, unchanged: result.unchanged.length, removed: result.removed.length },
    'Change detection complete',
  );
  return result;
}

/**
 * Shift results of an unchanged form that moved within its file. Lines are
 * kept relative to the form's first line.
 */
export function rebaseResults(results: readonly SiteResult[], previousStart: number, currentStart: number): SiteResult[] {
  const delta = currentStart - previousStart;
  return results.map((result) => ({ ...result, line: result.line + delta, reused: true }));
}

/** Same shift for the equivalent sites excluded from a moved form. */
export function rebaseEquivalent(
  equivalent: readonly EquivalentSite[],
  previousStart: number,
  currentStart: number,
): EquivalentSite[] {
  const delta = currentStart - previousStart;
  return equivalent.map((entry) => ({
    ...entry,
    site: { ...entry.site, line: entry.site.line + delta, form_line: entry.site.form_line + delta },
  }));
}
