export { FileSystemSourceStore, discoverSources } from './source-store';
export type { SourceStore, SourcePatterns } from './source-store';
export { FileLock, MutationApplier, parseSingleForm, spliceSite } from './applier';
export type { MutationHandle } from './applier';
export { ActiveMutantSlot, DEFAULT_SELECTOR, compileSchemata } from './schemata-compiler';
export type { SchemaBundle, SchemataOptions } from './schemata-compiler';
