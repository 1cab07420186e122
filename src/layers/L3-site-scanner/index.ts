export { scanForms, scanSource, siteId } from './scanner';
export type { ScanFailure, ScanResult } from './scanner';
