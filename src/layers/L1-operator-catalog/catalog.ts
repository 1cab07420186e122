import { createLogger } from '../../shared/logger';
import type { PresetName } from '../../shared/types';
import type { MutationOperator } from './define';
import {
  ARITHMETIC_OPERATORS,
  COLLECTION_OPERATORS,
  CONDITIONAL_OPERATORS,
  CONSTANT_OPERATORS,
  LOGICAL_OPERATORS,
} from './operators';
import { RELATIONAL_OPERATORS } from './relational';

const log = createLogger({ layer: 'L1', module: 'catalog' });

/** Every operator, in declaration order (the scanner's secondary order). */
export const CATALOG: readonly MutationOperator[] = [
  ...ARITHMETIC_OPERATORS,
  ...RELATIONAL_OPERATORS,
  ...LOGICAL_OPERATORS,
  ...CONDITIONAL_OPERATORS,
  ...CONSTANT_OPERATORS,
  ...COLLECTION_OPERATORS,
];

const BY_ID = new Map(CATALOG.map((op) => [op.id, op]));

export function getOperator(id: string): MutationOperator | undefined {
  return BY_ID.get(id);
}

/** Ids dominated directly by some other operator of the same family. */
function dominatedIds(operators: readonly MutationOperator[]): Set<string> {
  const dominated = new Set<string>();
  for (const op of operators) {
    for (const id of op.dominates) dominated.add(id);
  }
  return dominated;
}

function computePresets(): Record<PresetName, readonly MutationOperator[]> {
  const dominated = dominatedIds(CATALOG);
  return {
    all: CATALOG,
    standard: CATALOG.filter((op) => op.category !== 'constant'),
    minimal: CATALOG.filter(
      (op) =>
        (op.category === 'relational' && !dominated.has(op.id)) ||
        op.category === 'arithmetic' ||
        op.category === 'logical',
    ),
  };
}

const PRESETS = computePresets();

export function presetOperators(name: PresetName): readonly MutationOperator[] {
  return PRESETS[name];
}

export interface OperatorSelection {
  preset?: PresetName;
  include?: string[];
  exclude?: string[];
}

/**
 * Resolve a preset plus explicit additions/removals to operators in
 * catalog declaration order. Unknown ids are logged and ignored.
 */
export function resolveOperators(selection: OperatorSelection = {}): MutationOperator[] {
  const selected = new Set(presetOperators(selection.preset ?? 'standard').map((op) => op.id));
  for (const id of selection.include ?? []) {
    if (BY_ID.has(id)) selected.add(id);
    else log.warn({ operatorId: id }, 'Unknown operator id in include list');
  }
  for (const id of selection.exclude ?? []) {
    if (!BY_ID.has(id)) log.warn({ operatorId: id }, 'Unknown operator id in exclude list');
    selected.delete(id);
  }
  return CATALOG.filter((op) => selected.has(op.id));
}
