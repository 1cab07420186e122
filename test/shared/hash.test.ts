import { describe, it, expect } from 'vitest';
import { hashContent, hashEntries } from '../../src/shared/hash';

describe('hashContent', () => {
  it('returns 16 hex characters of the sha256 digest', () => {
    expect(hashContent('')).toBe('e3b0c44298fc1c14');
    expect(hashContent('(+ a b)')).toMatch(/^[0-9a-f]{16}$/);
  });
});

describe('hashEntries', () => {
  it('ignores entry order', () => {
    expect(hashEntries([['b', '2'], ['a', '1']])).toBe(hashEntries([['a', '1'], ['b', '2']]));
  });

  it('tells a missing file from an empty one', () => {
    expect(hashEntries([['a', null]])).not.toBe(hashEntries([['a', '']]));
  });

  it('changes when a content changes', () => {
    expect(hashEntries([['a', '1']])).not.toBe(hashEntries([['a', '2']]));
  });
});
