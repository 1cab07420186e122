import path from 'path';
import { createLogger } from '../../shared/logger';
import type { FormBridgeEntry } from '../../shared/types';

const log = createLogger({ layer: 'L2', module: 'form-locator' });

interface LocatedForm {
  startLine: number;
  formId: string;
}

function normalizeFile(file: string): string {
  return path.posix.normalize(file.replace(/\\/g, '/')).replace(/^\.\//, '');
}

/**
 * Resolves `(file, line)` to the trace oracle's form id by predecessor
 * search: the form whose start line is the greatest value ≤ the line.
 *
 * Several forms starting on one line cannot be told apart by line alone;
 * the first one registered wins.
 */
export class FormLocator {
  private readonly byFile = new Map<string, LocatedForm[]>();

  static fromBridge(entries: readonly FormBridgeEntry[]): FormLocator {
    const locator = new FormLocator();
    for (const entry of entries) {
      const file = normalizeFile(entry.file);
      const forms = locator.byFile.get(file) ?? [];
      forms.push({ startLine: entry.startLine, formId: entry.formId });
      locator.byFile.set(file, forms);
    }
    for (const [file, forms] of locator.byFile) {
      // Array.prototype.sort is stable, so registration order survives ties.
      forms.sort((a, b) => a.startLine - b.startLine);
      for (let i = 1; i < forms.length; i++) {
        if (forms[i].startLine === forms[i - 1].startLine) {
          log.debug(
            { file, line: forms[i].startLine, kept: forms[i - 1].formId, shadowed: forms[i].formId },
            'Multiple forms start on one line',
          );
        }
      }
    }
    return locator;
  }

  locate(file: string, line: number): string | undefined {
    const forms = this.byFile.get(normalizeFile(file));
    if (!forms || forms.length === 0) return undefined;

    let lo = 0;
    let hi = forms.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      if (forms[mid].startLine <= line) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    if (found < 0) return undefined;
    while (found > 0 && forms[found - 1].startLine === forms[found].startLine) found--;
    return forms[found].formId;
  }

  files(): string[] {
    return [...this.byFile.keys()].sort();
  }
}
