export { parse, render, LineIndex } from './reader';
export {
  decode,
  encode,
  replace,
  replaceAtPath,
  resolvePath,
  nodeAtPath,
  segmentFor,
  nodeDigest,
  formatCoordinate,
  parseCoordinate,
  locationKey,
} from './coordinates';
export type { PhysicalPath } from './coordinates';
export { walkScannable, enterNode, isScannable, UNQUOTED } from './walker';
export type { Visit, QuoteState } from './walker';
export { extractForms, parseSource } from './forms';
export type { Form, ParsedSource } from './forms';
export * from './nodes';
