export { detectChanges, digestForms, rebaseEquivalent, rebaseResults } from './change-detector';
export type { ChangeSet, DetectOptions, DigestTable, FormDigestEntry } from './change-detector';
export { StateStore } from './state-store';
export type { RunState } from './state-store';
