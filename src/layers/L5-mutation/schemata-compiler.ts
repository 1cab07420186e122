import { hashContent } from '../../shared/hash';
import { createLogger } from '../../shared/logger';
import { ERROR_CODES, MutaformError, toError, type MutationSite } from '../../shared/types';
import {
  makeList,
  makeToken,
  nodeAtPath,
  parseSource,
  render,
  replaceAtPath,
  resolvePath,
  type SyntaxNode,
} from '../L0-syntax-tree';
import { parseSingleForm } from './applier';

const log = createLogger({ layer: 'L5', module: 'schemata-compiler' });

export const DEFAULT_SELECTOR = 'mutaform.schemata/active-mutant';

export interface SchemataOptions {
  /** Zero-arity function the host runtime resolves to the active mutant id */
  selector?: string;
}

export interface SchemaBundle {
  file: string;
  selector: string;
  /** Mutant ids in the order they were embedded */
  mutantIds: string[];
  /** Mutant id → site id */
  discriminator: Map<string, string>;
  original: string;
  compiled: string;
}

interface EditGroup {
  formIndex: number;
  path: number[];
  mutants: Array<{ id: string; node: SyntaxNode }>;
}

function caseForm(selector: string, mutants: EditGroup['mutants'], original: SyntaxNode): SyntaxNode {
  const branches = mutants.flatMap(({ id, node }) => [makeToken(JSON.stringify(id)), node]);
  return makeList([makeToken('case'), makeList([makeToken(selector)]), ...branches, original]);
}

/**
 * Embed every site of one file as a branch selected at run time. With no
 * mutant active the `case` default evaluates the original expression, so
 * the compiled file behaves like the source.
 */
export function compileSchemata(
  file: string,
  text: string,
  sites: readonly MutationSite[],
  options: SchemataOptions = {},
): SchemaBundle {
  const selector = options.selector ?? DEFAULT_SELECTOR;
  const source = parseSource(file, text);
  const snapshot = hashContent(text);
  const formIndex = new Map(source.forms.map((form) => [form.id, form]));

  const groups = new Map<string, EditGroup>();
  const mutantIds: string[] = [];
  const discriminator = new Map<string, string>();

  for (const site of sites) {
    if (site.file !== file || site.snapshot !== snapshot) {
      throw new MutaformError({
        code: ERROR_CODES.LOCATION_NOT_FOUND,
        severity: 'medium',
        message: `Site ${site.id} was not scanned from the current text of ${file}`,
        context: { siteId: site.id, file },
      });
    }
    const form = formIndex.get(site.form_id);
    if (!form) {
      throw new MutaformError({
        code: ERROR_CODES.LOCATION_NOT_FOUND,
        severity: 'medium',
        message: `Form ${site.form_id} not found in ${file}`,
        context: { siteId: site.id },
      });
    }

    // Physical paths come from the unedited tree; later edits never move them.
    const path = resolvePath(form.node, site.coordinate);
    let node: SyntaxNode;
    try {
      node = parseSingleForm(site.replacement);
    } catch (err) {
      throw new MutaformError({
        code: ERROR_CODES.MUTATION_APPLY_FAILURE,
        severity: 'medium',
        message: `Replacement for ${site.id} is not a single form`,
        context: { siteId: site.id },
        cause: toError(err),
      });
    }

    const id = `m${mutantIds.length + 1}`;
    mutantIds.push(id);
    discriminator.set(id, site.id);

    const key = `${form.index}:${path.join('/')}`;
    const group = groups.get(key) ?? { formIndex: form.index, path, mutants: [] };
    group.mutants.push({ id, node });
    groups.set(key, group);
  }

  const roots = source.document.items.map((item) => item.node);
  const ordered = [...groups.values()].sort((a, b) => b.path.length - a.path.length);
  for (const group of ordered) {
    const root = roots[group.formIndex];
    const current = nodeAtPath(root, group.path);
    roots[group.formIndex] = replaceAtPath(root, group.path, caseForm(selector, group.mutants, current));
  }

  const compiled = render({
    items: source.document.items.map((item, i) => ({ before: item.before, node: roots[i] })),
    trailing: source.document.trailing,
  });

  log.debug({ file, mutants: mutantIds.length, edits: groups.size }, 'Compiled schemata bundle');
  return { file, selector, mutantIds, discriminator, original: text, compiled };
}

/**
 * The one selector of a loaded bundle. Activation is sequential: a second
 * `withActive` while one is running is a programming error.
 */
export class ActiveMutantSlot {
  private current: string | null = null;

  async withActive<T>(mutantId: string, fn: (activeMutant: string) => Promise<T>): Promise<T> {
    if (this.current !== null) {
      throw new Error(`Mutant ${this.current} is still active; cannot activate ${mutantId}`);
    }
    this.current = mutantId;
    try {
      return await fn(mutantId);
    } finally {
      this.current = null;
    }
  }
}
