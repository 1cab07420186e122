import { createHash } from 'crypto';

/** SHA-256 truncated to 16 hex chars. */
export function hashContent(content: string): string {
  return createHash('sha256').update(content).digest('hex').slice(0, 16);
}

/** Order-independent hash of named contents (e.g. a dependency set). */
export function hashEntries(entries: Array<[name: string, content: string | null]>): string {
  const sorted = [...entries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const hash = createHash('sha256');
  for (const [name, content] of sorted) {
    hash.update(name);
    hash.update('\0');
    hash.update(content === null ? '<missing>' : hashContent(content));
    hash.update('\n');
  }
  return hash.digest('hex').slice(0, 16);
}
