import { hashContent } from '../../shared/hash';
import { createLogger } from '../../shared/logger';
import { ERROR_CODES, MutaformError, isMutaformError, toError, type MutationSite } from '../../shared/types';
import {
  nodeAtPath,
  parse,
  parseSource,
  render,
  replaceAtPath,
  resolvePath,
  type SyntaxNode,
} from '../L0-syntax-tree';
import type { SourceStore } from './source-store';

const log = createLogger({ layer: 'L5', module: 'applier' });

export interface MutationHandle {
  site: MutationSite;
  file: string;
  /** File text before the edit */
  original: string;
  /** Exact bytes before the edit; `revert` writes these back */
  originalBytes: Buffer;
  mutated: string;
  reverted: boolean;
}

function applyFailure(site: MutationSite, message: string, cause?: unknown): MutaformError {
  return new MutaformError({
    code: ERROR_CODES.MUTATION_APPLY_FAILURE,
    severity: 'medium',
    message: `${message} (${site.id})`,
    context: { siteId: site.id, file: site.file },
    cause: cause === undefined ? undefined : toError(cause),
  });
}

/** Parse text that must hold exactly one form (a replacement or mutant). */
export function parseSingleForm(text: string): SyntaxNode {
  const doc = parse(text);
  if (doc.items.length !== 1) {
    throw new Error(`Expected exactly one form, found ${doc.items.length}`);
  }
  return doc.items[0].node;
}

/**
 * Pure splice: the file text with `site` applied. Every byte outside the
 * targeted node is kept. Throws LocationNotFound when the snapshot differs.
 */
export function spliceSite(text: string, site: MutationSite): string {
  if (hashContent(text) !== site.snapshot) {
    throw new MutaformError({
      code: ERROR_CODES.LOCATION_NOT_FOUND,
      severity: 'medium',
      message: `${site.file} changed since it was scanned (${site.id})`,
      context: { siteId: site.id, file: site.file },
    });
  }
  const source = parseSource(site.file, text);
  const form = source.forms.find((f) => f.id === site.form_id);
  if (!form) {
    throw new MutaformError({
      code: ERROR_CODES.LOCATION_NOT_FOUND,
      severity: 'medium',
      message: `Form ${site.form_id} not found in ${site.file}`,
      context: { siteId: site.id, formId: site.form_id },
    });
  }

  const path = resolvePath(form.node, site.coordinate);
  let replacement: SyntaxNode;
  try {
    replacement = parseSingleForm(site.replacement);
  } catch (err) {
    throw applyFailure(site, 'Replacement text is not a single form', err);
  }
  const current = nodeAtPath(form.node, path);
  if (current.span === undefined) {
    throw applyFailure(site, 'Target node has no source span');
  }

  const mutatedForm = replaceAtPath(form.node, path, replacement);
  return render({
    items: source.document.items.map((item, i) => (i === form.index ? { before: item.before, node: mutatedForm } : item)),
    trailing: source.document.trailing,
  });
}

/**
 * Serializes mutation cycles per file: at most one mutated state is
 * outstanding for a file at any time.
 */
export class FileLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(file: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(file) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(file, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(file) === tail) this.tails.delete(file);
    }
  }
}

export class MutationApplier {
  constructor(
    private readonly store: SourceStore,
    private readonly lock: FileLock = new FileLock(),
  ) {}

  /** Write the mutant to disk. The file is untouched when this throws. */
  async apply(site: MutationSite): Promise<MutationHandle> {
    let originalBytes: Buffer;
    try {
      originalBytes = await this.store.readBytes(site.file);
    } catch (err) {
      throw applyFailure(site, 'Could not read source file', err);
    }
    const original = originalBytes.toString('utf-8');

    let mutated: string;
    try {
      mutated = spliceSite(original, site);
    } catch (err) {
      if (isMutaformError(err)) throw err;
      throw applyFailure(site, 'Splice failed', err);
    }

    try {
      await this.store.write(site.file, mutated);
    } catch (err) {
      throw applyFailure(site, 'Could not write mutated source', err);
    }
    log.debug({ siteId: site.id, file: site.file }, 'Mutation applied');
    return { site, file: site.file, original, originalBytes, mutated, reverted: false };
  }

  /** Restore the pre-edit bytes exactly. A failure here is fatal. */
  async revert(handle: MutationHandle): Promise<void> {
    try {
      await this.store.write(handle.file, handle.originalBytes);
      const restored = await this.store.readBytes(handle.file);
      if (!restored.equals(handle.originalBytes)) {
        throw new Error('Restored content differs from the original');
      }
    } catch (err) {
      throw new MutaformError({
        code: ERROR_CODES.REVERT_FAILURE,
        severity: 'critical',
        message: `Failed to restore ${handle.file} after ${handle.site.id}`,
        context: { siteId: handle.site.id, file: handle.file },
        cause: toError(err),
      });
    }
    handle.reverted = true;
    log.debug({ siteId: handle.site.id, file: handle.file }, 'Mutation reverted');
  }

  /**
   * Scoped mutation: apply, run `fn`, and revert on every exit path
   * (return, throw, timeout-driven abort). A revert failure overrides any
   * error from `fn`.
   */
  async withMutation<T>(site: MutationSite, fn: (handle: MutationHandle) => Promise<T>): Promise<T> {
    return this.lock.run(site.file, async () => {
      const handle = await this.apply(site);
      try {
        return await fn(handle);
      } finally {
        await this.revert(handle);
      }
    });
  }

  /** Scoped whole-file replacement, used for schemata bundles. */
  async withContent<T>(file: string, content: string, fn: () => Promise<T>): Promise<T> {
    return this.lock.run(file, async () => {
      const originalBytes = await this.store.readBytes(file);
      const original = originalBytes.toString('utf-8');
      await this.store.write(file, content);
      const handle: MutationHandle = {
        site: schemataPseudoSite(file, original),
        file,
        original,
        originalBytes,
        mutated: content,
        reverted: false,
      };
      try {
        return await fn();
      } finally {
        await this.revert(handle);
      }
    });
  }
}

function schemataPseudoSite(file: string, original: string): MutationSite {
  return {
    id: `${file}@schemata`,
    file,
    form_id: file,
    form_line: 1,
    line: 1,
    coordinate: [],
    operator_id: 'schemata',
    category: 'constant',
    family: 'schemata',
    hardness: 0,
    original: '',
    replacement: '',
    scan_order: -1,
    snapshot: hashContent(original),
  };
}
