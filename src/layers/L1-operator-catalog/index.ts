export { defineOperator } from './define';
export type { MutationOperator, OperatorDefinition, MatchContext, BoundMatch } from './define';
export { CATALOG, getOperator, presetOperators, resolveOperators } from './catalog';
export type { OperatorSelection } from './catalog';
export { COMPARATORS, killPartitions, relationalOperatorId, RELATIONAL_OPERATORS } from './relational';
export {
  ARITHMETIC_OPERATORS,
  LOGICAL_OPERATORS,
  CONDITIONAL_OPERATORS,
  CONSTANT_OPERATORS,
  COLLECTION_OPERATORS,
} from './operators';
