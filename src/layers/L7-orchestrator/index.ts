export { runMutationTesting } from './orchestrator';
export type { ClusteringOptions, MutationRunOptions } from './orchestrator';
export { VerdictTracker, countVerdicts, emptyCounts, mutationScore, runTestPhase } from './verdict';
export type { TestPhaseOptions, TestPhaseResult } from './verdict';
