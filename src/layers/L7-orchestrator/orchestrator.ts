import { hashContent } from '../../shared/hash';
import { createLogger } from '../../shared/logger';
import {
  ERROR_CODES,
  MutaformError,
  isMutaformError,
  toError,
  type ClusterKeyKind,
  type EquivalentSite,
  type ExecutionMode,
  type MutationSite,
  type ReloadService,
  type RunReport,
  type SiteResult,
  type TestExecutionService,
  type Verdict,
} from '../../shared/types';
import { formatCoordinate, nodeAtPath, parseSource, resolvePath, type Form, type ParsedSource } from '../L0-syntax-tree';
import type { MutationOperator } from '../L1-operator-catalog';
import type { CoverageIndex, FormLocator } from '../L2-coverage-index';
import { scanForms, type ScanFailure } from '../L3-site-scanner';
import {
  buildDominanceGraph,
  clusterSites,
  filterEquivalent,
  propagateVerdicts,
  reduceSites,
  singletonClusters,
} from '../L4-optimizer';
import {
  ActiveMutantSlot,
  MutationApplier,
  compileSchemata,
  type SchemaBundle,
  type SourceStore,
} from '../L5-mutation';
import {
  StateStore,
  detectChanges,
  digestForms,
  rebaseEquivalent,
  rebaseResults,
  type RunState,
} from '../L6-change-detector';
import { VerdictTracker, countVerdicts, mutationScore, runTestPhase, type TestPhaseResult } from './verdict';

const log = createLogger({ layer: 'L7', module: 'orchestrator' });

export interface ClusteringOptions {
  enabled: boolean;
  key: ClusterKeyKind;
  prefixDepth: number;
}

export interface MutationRunOptions {
  /** Root-relative source files to mutate */
  files: readonly string[];
  store: SourceStore;
  operators: readonly MutationOperator[];
  coverage: CoverageIndex;
  /** Maps a form's file and start line to the form id the trace oracle reports */
  locator?: FormLocator;
  executor: TestExecutionService;
  reloader: ReloadService;
  /** Tests whose coverage was recomputed; forms they cover are re-run */
  changedTests?: ReadonlySet<string>;
  mode?: ExecutionMode;
  clustering?: ClusteringOptions;
  schemata?: { selector?: string; maxBatchSize?: number };
  timeoutMs: number;
  testConcurrency?: number;
  /** Persist results here; with `incremental`, reuse results of unchanged forms */
  stateStore?: StateStore;
  incremental?: boolean;
}

interface Execution {
  options: MutationRunOptions;
  applier: MutationApplier;
  tracker: VerdictTracker;
  results: Map<string, SiteResult>;
  reloads: number;
}

function settingsHash(options: MutationRunOptions): string {
  return hashContent(
    JSON.stringify({
      operators: options.operators.map((op) => op.id),
      clustering: options.clustering ?? null,
    }),
  );
}

/** Form id under which the coverage index knows the form starting at `file:line`. */
function coverageFormId(options: MutationRunOptions, file: string, line: number, formId: string): string {
  return options.locator?.locate(file, line) ?? formId;
}

function coveringTests(options: MutationRunOptions, site: MutationSite, form: Form | undefined): string[] {
  const formId = coverageFormId(options, site.file, site.form_line, site.form_id);
  const leaf = form !== undefined && nodeAtPath(form.node, resolvePath(form.node, site.coordinate)).kind === 'token';
  return [...options.coverage.testsCovering(formId, site.coordinate, leaf)].sort();
}

function siteResult(site: MutationSite, verdict: Verdict, tests: readonly string[], startedAt: number): SiteResult {
  return {
    site_id: site.id,
    file: site.file,
    form_id: site.form_id,
    line: site.line,
    coordinate: formatCoordinate(site.coordinate),
    operator_id: site.operator_id,
    original: site.original,
    replacement: site.replacement,
    verdict,
    tests: [...tests],
    duration_ms: Date.now() - startedAt,
  };
}

function settle(exec: Execution, result: SiteResult): void {
  exec.tracker.settle(result.site_id, result.verdict);
  exec.results.set(result.site_id, result);
  log.debug({ siteId: result.site_id, verdict: result.verdict }, 'Site settled');
}

function fromPhase(site: MutationSite, tests: readonly string[], phase: TestPhaseResult, startedAt: number): SiteResult {
  const result = siteResult(site, phase.verdict, tests, startedAt);
  if (phase.decisiveTest !== undefined) result.decisive_test = phase.decisiveTest;
  if (phase.detail !== undefined) result.detail = phase.detail;
  return result;
}

function errorResult(site: MutationSite, tests: readonly string[], err: unknown, startedAt: number): SiteResult {
  return { ...siteResult(site, 'error', tests, startedAt), detail: toError(err).message };
}

async function reload(exec: Execution): Promise<boolean> {
  exec.reloads++;
  try {
    return (await exec.options.reloader.reload()) === 'success';
  } catch (err) {
    log.warn({ err }, 'Reload service threw');
    return false;
  }
}

/** After a restore the original must load again, or nothing later can be trusted. */
async function reloadRestored(exec: Execution, file: string): Promise<void> {
  if (await reload(exec)) return;
  throw new MutaformError({
    code: ERROR_CODES.RELOAD_FAILURE,
    severity: 'critical',
    message: `Reloading restored source ${file} failed`,
    context: { file },
  });
}

function isFatal(err: unknown): boolean {
  return (
    isMutaformError(err, ERROR_CODES.REVERT_FAILURE) ||
    isMutaformError(err, ERROR_CODES.RELOAD_FAILURE) ||
    isMutaformError(err, ERROR_CODES.VERDICT_TRANSITION) ||
    !isMutaformError(err)
  );
}

async function executeSingle(exec: Execution, site: MutationSite, tests: readonly string[]): Promise<void> {
  const startedAt = Date.now();
  let outcome: SiteResult;
  try {
    outcome = await exec.applier.withMutation(site, async () => {
      if (!(await reload(exec))) {
        return { ...siteResult(site, 'error', tests, startedAt), detail: 'mutant failed to load' };
      }
      const phase = await runTestPhase({
        tests,
        executor: exec.options.executor,
        activeMutant: null,
        timeoutMs: exec.options.timeoutMs,
        concurrency: exec.options.testConcurrency ?? 1,
      });
      return fromPhase(site, tests, phase, startedAt);
    });
  } catch (err) {
    if (isFatal(err)) throw err;
    log.warn({ siteId: site.id, err }, 'Mutation could not be applied');
    settle(exec, errorResult(site, tests, err, startedAt));
    return;
  }
  await reloadRestored(exec, site.file);
  settle(exec, outcome);
}

interface Covered {
  site: MutationSite;
  tests: string[];
}

async function executeSchemataBatch(exec: Execution, file: string, batch: readonly Covered[]): Promise<Covered[]> {
  const text = await exec.options.store.read(file);
  let bundle: SchemaBundle;
  try {
    bundle = compileSchemata(
      file,
      text,
      batch.map((c) => c.site),
      { selector: exec.options.schemata?.selector },
    );
  } catch (err) {
    if (isFatal(err)) throw err;
    log.warn({ file, err }, 'Schemata compilation failed; falling back to single mode');
    return [...batch];
  }

  const bySite = new Map(batch.map((c) => [c.site.id, c]));
  const slot = new ActiveMutantSlot();
  const loaded = await exec.applier.withContent(file, bundle.compiled, async () => {
    if (!(await reload(exec))) return false;
    for (const mutantId of bundle.mutantIds) {
      const covered = bySite.get(bundle.discriminator.get(mutantId) ?? '');
      if (!covered) continue;
      const startedAt = Date.now();
      const phase = await slot.withActive(mutantId, (activeMutant) =>
        runTestPhase({
          tests: covered.tests,
          executor: exec.options.executor,
          activeMutant,
          timeoutMs: exec.options.timeoutMs,
          concurrency: exec.options.testConcurrency ?? 1,
        }),
      );
      settle(exec, fromPhase(covered.site, covered.tests, phase, startedAt));
    }
    return true;
  });
  await reloadRestored(exec, file);

  if (!loaded) {
    log.warn({ file, mutants: batch.length }, 'Schemata bundle failed to load; falling back to single mode');
    return [...batch];
  }
  return [];
}

async function executeSchemata(exec: Execution, covered: readonly Covered[]): Promise<void> {
  const maxBatch = Math.max(1, exec.options.schemata?.maxBatchSize ?? Number.POSITIVE_INFINITY);
  const byFile = new Map<string, Covered[]>();
  for (const c of covered) {
    const group = byFile.get(c.site.file) ?? [];
    group.push(c);
    byFile.set(c.site.file, group);
  }

  for (const [file, group] of byFile) {
    for (let i = 0; i < group.length; i += maxBatch) {
      const fallback = await executeSchemataBatch(exec, file, group.slice(i, i + maxBatch));
      for (const c of fallback) await executeSingle(exec, c.site, c.tests);
    }
  }
}

function scanFailureResult(failure: ScanFailure): SiteResult {
  return { ...siteResult(failure.site, 'error', [], Date.now()), detail: failure.error.message };
}

function compareResults(a: SiteResult, b: SiteResult): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  return a.site_id < b.site_id ? -1 : a.site_id > b.site_id ? 1 : 0;
}

function compareEquivalent(a: EquivalentSite, b: EquivalentSite): number {
  if (a.site.file !== b.site.file) return a.site.file < b.site.file ? -1 : 1;
  if (a.site.line !== b.site.line) return a.site.line - b.site.line;
  return a.site.id < b.site.id ? -1 : a.site.id > b.site.id ? 1 : 0;
}

/**
 * Full pipeline: parse, detect changes, scan changed forms, filter, reduce,
 * cluster, execute, propagate, merge reused results, score and persist.
 */
export async function runMutationTesting(options: MutationRunOptions): Promise<RunReport> {
  const startedAt = Date.now();
  const sources: ParsedSource[] = [];
  for (const file of options.files) {
    sources.push(parseSource(file, await options.store.read(file)));
  }
  const forms = new Map<string, Form>();
  for (const source of sources) {
    for (const form of source.forms) forms.set(form.id, form);
  }

  const hash = settingsHash(options);
  let previous: RunState | null = null;
  if (options.incremental && options.stateStore) {
    previous = options.stateStore.load();
    if (previous && previous.settings_hash !== hash) {
      log.info('Operator or clustering settings changed; re-running every form');
      previous = null;
    }
  }

  const testsForForm = (form: Form): ReadonlySet<string> =>
    options.coverage.testsForForm(coverageFormId(options, form.file, form.startLine, form.id));
  const digests = digestForms([...forms.values()], testsForForm);
  const changes = detectChanges({
    previous: previous?.digests ?? null,
    current: digests,
    changedTests: options.changedTests ?? new Set(),
    testsForForm: (formId) => {
      const form = forms.get(formId);
      return form ? testsForForm(form) : new Set<string>();
    },
  });
  const changed = new Set(changes.changed);

  // Scan
  const scanned: MutationSite[] = [];
  const failures: ScanFailure[] = [];
  for (const source of sources) {
    const result = scanForms(
      source,
      source.forms.filter((form) => changed.has(form.id)),
      options.operators,
      scanned.length + failures.length,
    );
    scanned.push(...result.sites);
    failures.push(...result.failures);
  }

  // Optimize
  const operatorsById = new Map(options.operators.map((op) => [op.id, op]));
  const { kept, equivalent } = filterEquivalent(scanned, forms, (id) => operatorsById.get(id));
  const reduced = reduceSites(kept, buildDominanceGraph(options.operators));
  const clusters = options.clustering?.enabled
    ? clusterSites(reduced, {
        key: options.clustering.key,
        prefixDepth: options.clustering.prefixDepth,
        forms,
      })
    : singletonClusters(reduced);
  log.info(
    {
      scanned: scanned.length,
      equivalent: equivalent.length,
      reduced: reduced.length,
      clusters: clusters.length,
      changedForms: changes.changed.length,
    },
    'Mutation sites prepared',
  );

  // Execute representatives
  const exec: Execution = {
    options,
    applier: new MutationApplier(options.store),
    tracker: new VerdictTracker(),
    results: new Map(),
    reloads: 0,
  };
  const covered: Covered[] = [];
  for (const { representative: site } of clusters) {
    exec.tracker.register(site.id);
    const tests = coveringTests(options, site, forms.get(site.form_id));
    if (tests.length === 0) {
      settle(exec, siteResult(site, 'no-coverage', [], Date.now()));
    } else {
      covered.push({ site, tests });
    }
  }

  if (options.mode === 'schemata') {
    await executeSchemata(exec, covered);
  } else {
    for (const c of covered) await executeSingle(exec, c.site, c.tests);
  }

  const pending = exec.tracker.pending();
  if (pending.length > 0) {
    throw new MutaformError({
      code: ERROR_CODES.VERDICT_TRANSITION,
      severity: 'critical',
      message: `${pending.length} site(s) finished without a verdict`,
      context: { pending },
    });
  }

  // Merge
  const fresh = [...propagateVerdicts(clusters, exec.results), ...failures.map(scanFailureResult)];
  const reusedForms: string[] = [];
  const reused: SiteResult[] = [];
  const reusedEquivalent: EquivalentSite[] = [];
  if (previous) {
    for (const formId of changes.unchanged) {
      const before = previous.digests[formId];
      const form = forms.get(formId);
      if (!before || !form) continue;
      reusedForms.push(formId);
      reused.push(...rebaseResults(previous.results[formId] ?? [], before.start_line, form.startLine));
      reusedEquivalent.push(
        ...rebaseEquivalent(previous.equivalent[formId] ?? [], before.start_line, form.startLine),
      );
    }
  }
  const results = [...fresh, ...reused].sort(compareResults);
  const counts = countVerdicts(results.map((r) => r.verdict));
  const allEquivalent = [...equivalent, ...reusedEquivalent].sort(compareEquivalent);

  if (options.stateStore) {
    const byForm: Record<string, SiteResult[]> = {};
    for (const formId of forms.keys()) byForm[formId] = [];
    for (const result of results) byForm[result.form_id]?.push(result);
    const equivalentByForm: Record<string, EquivalentSite[]> = {};
    for (const formId of forms.keys()) equivalentByForm[formId] = [];
    for (const entry of allEquivalent) equivalentByForm[entry.site.form_id]?.push(entry);
    options.stateStore.save({
      version: 1,
      settings_hash: hash,
      digests,
      results: byForm,
      equivalent: equivalentByForm,
      updated_at: new Date().toISOString(),
    });
  }

  const report: RunReport = {
    results,
    equivalent: allEquivalent,
    counts,
    score: mutationScore(counts),
    changed_forms: changes.changed,
    reused_forms: reusedForms,
    removed_forms: changes.removed,
    reload_count: exec.reloads,
    duration_ms: Date.now() - startedAt,
  };
  log.info({ counts, score: report.score, reloads: exec.reloads }, 'Mutation run complete');
  return report;
}
