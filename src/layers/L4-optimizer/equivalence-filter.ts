import { createLogger } from '../../shared/logger';
import type { EquivalentSite, MutationSite } from '../../shared/types';
import { nodeAtPath, resolvePath, type Form } from '../L0-syntax-tree';
import type { MatchContext, MutationOperator } from '../L1-operator-catalog';

const log = createLogger({ layer: 'L4', module: 'equivalence-filter' });

export interface EquivalenceResult {
  kept: MutationSite[];
  equivalent: EquivalentSite[];
}

/** Rebuild the matcher context of a site from the tree it was scanned from. */
export function contextAt(form: Form, site: MutationSite): MatchContext {
  const path = resolvePath(form.node, site.coordinate);
  if (path.length === 0) return { node: form.node, parent: undefined, index: -1 };
  return {
    node: nodeAtPath(form.node, path),
    parent: nodeAtPath(form.node, path.slice(0, -1)),
    index: path[path.length - 1],
  };
}

/**
 * Drop sites whose operator's equivalence rule holds in the node's local
 * context. Purely syntactic: mutants equivalent only at run time survive
 * this filter.
 */
export function filterEquivalent(
  sites: readonly MutationSite[],
  forms: ReadonlyMap<string, Form>,
  operatorFor: (id: string) => MutationOperator | undefined,
): EquivalenceResult {
  const kept: MutationSite[] = [];
  const equivalent: EquivalentSite[] = [];

  for (const site of sites) {
    const operator = operatorFor(site.operator_id);
    const form = forms.get(site.form_id);
    if (!operator?.hasEquivalenceRule || !form) {
      kept.push(site);
      continue;
    }

    const reason = operator.bind(contextAt(form, site))?.equivalence();
    if (reason) {
      equivalent.push({ site, tag: 'provably-equivalent', reason });
    } else {
      kept.push(site);
    }
  }

  if (equivalent.length > 0) {
    log.debug({ equivalent: equivalent.length, kept: kept.length }, 'Excluded provably-equivalent sites');
  }
  return { kept, equivalent };
}
