export { filterEquivalent, contextAt } from './equivalence-filter';
export type { EquivalenceResult } from './equivalence-filter';
export { buildDominanceGraph, dominatedClosure, reduceOperators, reduceSites } from './subsumption-reducer';
export type { DominanceGraph } from './subsumption-reducer';
export {
  clusterSites,
  clusterKey,
  parentShape,
  propagateVerdicts,
  singletonClusters,
} from './cluster-selector';
export type { Cluster, ClusterOptions } from './cluster-selector';
