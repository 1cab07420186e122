export { CoverageIndex, splitLocationKey } from './coverage-index';
export { FormLocator } from './form-locator';
export {
  CoverageStore,
  collectUnitCoverage,
  hashDependencies,
  refreshCoverage,
} from './coverage-store';
export type { CoverageServices, RefreshOptions, RefreshResult } from './coverage-store';
