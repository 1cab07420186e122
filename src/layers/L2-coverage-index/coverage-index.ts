import type { Coordinate, TraceEvent } from '../../shared/types';
import { locationKey } from '../L0-syntax-tree';

const EMPTY: ReadonlySet<string> = new Set();

export function splitLocationKey(key: string): { formId: string; coordinate: string } {
  const bar = key.lastIndexOf('|');
  return bar < 0 ? { formId: key, coordinate: '' } : { formId: key.slice(0, bar), coordinate: key.slice(bar + 1) };
}

/**
 * Forward (test → locations) and inverse (location → tests) coverage maps.
 * Instances are immutable once built; the inverse side is only ever written
 * together with the forward side, so it stays a pure function of it.
 */
export class CoverageIndex {
  private readonly forward = new Map<string, Set<string>>();
  private readonly inverse = new Map<string, Set<string>>();
  private readonly byForm = new Map<string, Set<string>>();

  private constructor() {}

  static empty(): CoverageIndex {
    return new CoverageIndex();
  }

  /** Fold trace events; repeated events for one test union. */
  static fromEvents(events: Iterable<TraceEvent>): CoverageIndex {
    const index = new CoverageIndex();
    for (const event of events) {
      index.add(event.testId, locationKey(event.formId, event.coordinate));
    }
    return index;
  }

  /** Build from persisted `testId → location keys` records. */
  static fromRecords(records: Record<string, readonly string[]>): CoverageIndex {
    const index = new CoverageIndex();
    for (const [testId, keys] of Object.entries(records)) {
      index.forward.set(testId, index.forward.get(testId) ?? new Set());
      for (const key of keys) index.add(testId, key);
    }
    return index;
  }

  /** Commutative, idempotent union of any number of indexes. */
  static merge(...indexes: CoverageIndex[]): CoverageIndex {
    const merged = new CoverageIndex();
    for (const index of indexes) {
      for (const [testId, keys] of index.forward) {
        merged.forward.set(testId, merged.forward.get(testId) ?? new Set());
        for (const key of keys) merged.add(testId, key);
      }
    }
    return merged;
  }

  private add(testId: string, key: string): void {
    let locations = this.forward.get(testId);
    if (!locations) {
      locations = new Set();
      this.forward.set(testId, locations);
    }
    locations.add(key);

    let tests = this.inverse.get(key);
    if (!tests) {
      tests = new Set();
      this.inverse.set(key, tests);
    }
    tests.add(testId);

    const { formId } = splitLocationKey(key);
    let formTests = this.byForm.get(formId);
    if (!formTests) {
      formTests = new Set();
      this.byForm.set(formId, formTests);
    }
    formTests.add(testId);
  }

  /** Tests that executed exactly this location. Empty when none did. */
  testsFor(formId: string, coord: Coordinate | string): ReadonlySet<string> {
    return this.inverse.get(locationKey(formId, coord)) ?? EMPTY;
  }

  /**
   * Tests for a site's location. Only an exact entry counts, except that a
   * token (`leaf`) may take the entry of its direct parent: trace events are
   * per evaluated expression, so a symbol or literal inside a traced call is
   * covered by that call. Nothing climbs further: a branch the tests never
   * took stays uncovered even when its enclosing form was traced.
   */
  testsCovering(formId: string, coord: Coordinate, leaf = false): ReadonlySet<string> {
    const exact = this.testsFor(formId, coord);
    if (exact.size > 0 || !leaf || coord.length === 0) return exact;
    return this.testsFor(formId, coord.slice(0, -1));
  }

  testsForForm(formId: string): ReadonlySet<string> {
    return this.byForm.get(formId) ?? EMPTY;
  }

  locationsFor(testId: string): ReadonlySet<string> {
    return this.forward.get(testId) ?? EMPTY;
  }

  tests(): string[] {
    return [...this.forward.keys()].sort();
  }

  /** Deterministic `testId → sorted location keys` snapshot for persistence. */
  records(): Record<string, string[]> {
    const out: Record<string, string[]> = {};
    for (const testId of this.tests()) {
      out[testId] = [...(this.forward.get(testId) ?? [])].sort();
    }
    return out;
  }

  get locationCount(): number {
    return this.inverse.size;
  }
}
