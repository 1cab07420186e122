import { createLogger } from '../../shared/logger';
import { ERROR_CODES, MutaformError, type MutationSite } from '../../shared/types';
import { formatCoordinate } from '../L0-syntax-tree';
import type { MutationOperator } from '../L1-operator-catalog';

const log = createLogger({ layer: 'L4', module: 'subsumption-reducer' });

/** Per-family dominance DAG: operator id → ids it directly dominates. */
export interface DominanceGraph {
  edges: ReadonlyMap<string, ReadonlySet<string>>;
  familyOf: ReadonlyMap<string, string>;
}

export function buildDominanceGraph(operators: readonly MutationOperator[]): DominanceGraph {
  const familyOf = new Map(operators.map((op) => [op.id, op.family]));
  const edges = new Map<string, Set<string>>();

  for (const op of operators) {
    const targets = new Set<string>();
    for (const id of op.dominates) {
      if (familyOf.get(id) === op.family) {
        targets.add(id);
      } else if (familyOf.has(id)) {
        log.debug({ from: op.id, to: id }, 'Ignoring cross-family dominance edge');
      }
    }
    edges.set(op.id, targets);
  }

  assertAcyclic(edges);
  return { edges, familyOf };
}

function assertAcyclic(edges: ReadonlyMap<string, ReadonlySet<string>>): void {
  const state = new Map<string, 'visiting' | 'done'>();

  const visit = (id: string, trail: string[]): void => {
    const current = state.get(id);
    if (current === 'done') return;
    if (current === 'visiting') {
      const cycle = [...trail.slice(trail.indexOf(id)), id];
      throw new MutaformError({
        code: ERROR_CODES.SUBSUMPTION_CYCLE,
        severity: 'critical',
        message: `Subsumption cycle: ${cycle.join(' → ')}`,
        context: { cycle },
      });
    }
    state.set(id, 'visiting');
    for (const next of edges.get(id) ?? []) visit(next, [...trail, id]);
    state.set(id, 'done');
  };

  for (const id of [...edges.keys()].sort()) visit(id, []);
}

/** Transitively dominated ids of `id` (excluding `id` itself). */
export function dominatedClosure(graph: DominanceGraph, id: string): Set<string> {
  const seen = new Set<string>();
  const stack = [...(graph.edges.get(id) ?? [])];
  while (stack.length > 0) {
    const next = stack.pop();
    if (next === undefined || seen.has(next)) continue;
    seen.add(next);
    stack.push(...(graph.edges.get(next) ?? []));
  }
  return seen;
}

/**
 * Drop every candidate that some other candidate (transitively) dominates.
 * Input order is preserved; duplicates collapse. Idempotent.
 */
export function reduceOperators(candidates: Iterable<string>, graph: DominanceGraph): string[] {
  const unique = [...new Set(candidates)];
  const dominated = new Set<string>();
  for (const id of unique) {
    for (const victim of dominatedClosure(graph, id)) {
      if (victim !== id) dominated.add(victim);
    }
  }
  return unique.filter((id) => !dominated.has(id));
}

/**
 * Apply the reduction per location: at each (form, coordinate) only the
 * non-dominated operators keep their sites.
 */
export function reduceSites(sites: readonly MutationSite[], graph: DominanceGraph): MutationSite[] {
  const byLocation = new Map<string, MutationSite[]>();
  for (const site of sites) {
    const key = `${site.form_id}|${formatCoordinate(site.coordinate)}`;
    const group = byLocation.get(key) ?? [];
    group.push(site);
    byLocation.set(key, group);
  }

  const kept = new Set<string>();
  for (const group of byLocation.values()) {
    for (const id of reduceOperators(group.map((s) => s.operator_id), graph)) {
      for (const site of group) {
        if (site.operator_id === id) kept.add(site.id);
      }
    }
  }
  return sites.filter((site) => kept.has(site.id));
}
