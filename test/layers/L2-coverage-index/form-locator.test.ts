import { describe, it, expect } from 'vitest';
import { FormLocator } from '../../../src/layers/L2-coverage-index';

describe('FormLocator', () => {
  const locator = FormLocator.fromBridge([
    { formId: 'src/a.clj::defn g', file: 'src/a.clj', startLine: 7 },
    { formId: 'src/a.clj::ns a', file: './src/a.clj', startLine: 1 },
    { formId: 'src/a.clj::defn f', file: 'src/a.clj', startLine: 3 },
    { formId: 'src/a.clj::def x', file: 'src/a.clj', startLine: 7 },
  ]);

  it('resolves a line to the form starting at or before it', () => {
    expect(locator.locate('src/a.clj', 1)).toBe('src/a.clj::ns a');
    expect(locator.locate('src/a.clj', 5)).toBe('src/a.clj::defn f');
    expect(locator.locate('src/a.clj', 3)).toBe('src/a.clj::defn f');
  });

  it('prefers the first registered form when two start on one line', () => {
    expect(locator.locate('src/a.clj', 7)).toBe('src/a.clj::defn g');
    expect(locator.locate('src/a.clj', 100)).toBe('src/a.clj::defn g');
  });

  it('returns undefined before the first form or for unknown files', () => {
    expect(locator.locate('src/a.clj', 0)).toBeUndefined();
    expect(locator.locate('src/b.clj', 4)).toBeUndefined();
  });

  it('normalizes file paths', () => {
    expect(locator.locate('src\\a.clj', 4)).toBe('src/a.clj::defn f');
    expect(locator.files()).toEqual(['src/a.clj']);
  });
});
