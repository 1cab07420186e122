/**
 * Pipeline interface for CLI commands, plus the implementation that wires
 * the layers against the local filesystem and the configured commands.
 * Tests substitute a fake pipeline.
 */

import fs from 'fs';
import path from 'path';
import type { ResolvedConfig } from '../config';
import { createLogger } from '../shared/logger';
import type { EquivalentSite, MutationSite, RunReport, TestExecutionService } from '../shared/types';
import { parseSource, type Form } from '../layers/L0-syntax-tree';
import { resolveOperators, type MutationOperator } from '../layers/L1-operator-catalog';
import {
  CoverageIndex,
  CoverageStore,
  FormLocator,
  collectUnitCoverage,
  refreshCoverage,
} from '../layers/L2-coverage-index';
import { scanSource, type ScanFailure } from '../layers/L3-site-scanner';
import { buildDominanceGraph, filterEquivalent, reduceSites } from '../layers/L4-optimizer';
import { FileSystemSourceStore, discoverSources } from '../layers/L5-mutation';
import { StateStore } from '../layers/L6-change-detector';
import { runMutationTesting } from '../layers/L7-orchestrator';
import { CommandReloadService, CommandTestExecutor } from './adapters/command-runner';
import { FileTraceOracle, loadFormBridge } from './adapters/trace-oracle';

const log = createLogger({ layer: 'cli', module: 'local-pipeline' });

export interface ScanListing {
  files: string[];
  sites: MutationSite[];
  equivalent: EquivalentSite[];
  failures: ScanFailure[];
}

export interface RunRequest {
  schemata: boolean;
  /** Ignore stored state and run every form */
  full?: boolean;
}

export interface CliPipeline {
  /** Candidate sites after equivalence filtering and subsumption, without execution. */
  scan(files?: string[]): Promise<ScanListing>;
  run(request: RunRequest): Promise<RunReport>;
}

const unconfiguredExecutor: TestExecutionService = {
  run: async () => {
    throw new Error('runner.test_command is not configured');
  },
};

export class LocalPipeline implements CliPipeline {
  private readonly store: FileSystemSourceStore;
  private readonly operators: MutationOperator[];

  constructor(
    private readonly root: string,
    private readonly config: ResolvedConfig,
  ) {
    this.store = new FileSystemSourceStore(root);
    this.operators = resolveOperators(config.operators);
  }

  private files(requested?: string[]): string[] {
    if (requested && requested.length > 0) return requested;
    return discoverSources(this.root, this.config.sources);
  }

  private resolve(file: string): string {
    return path.resolve(this.root, file);
  }

  async scan(requested?: string[]): Promise<ScanListing> {
    const files = this.files(requested);
    const sites: MutationSite[] = [];
    const failures: ScanFailure[] = [];
    const forms = new Map<string, Form>();

    for (const file of files) {
      const source = parseSource(file, await this.store.read(file));
      for (const form of source.forms) forms.set(form.id, form);
      const result = scanSource(source, this.operators, sites.length + failures.length);
      sites.push(...result.sites);
      failures.push(...result.failures);
    }

    const byId = new Map(this.operators.map((op) => [op.id, op]));
    const { kept, equivalent } = filterEquivalent(sites, forms, (id) => byId.get(id));
    return {
      files,
      sites: reduceSites(kept, buildDominanceGraph(this.operators)),
      equivalent,
      failures,
    };
  }

  async run(request: RunRequest): Promise<RunReport> {
    const { config } = this;
    const stateDir = this.resolve(config.state_dir);
    const commandOptions = { cwd: this.root };

    const executor = config.runner.test_command
      ? new CommandTestExecutor(config.runner.test_command, commandOptions)
      : undefined;
    const reloader = new CommandReloadService(config.runner.reload_command, commandOptions);

    const locator = FormLocator.fromBridge(loadFormBridge(this.resolve(config.coverage.bridge_file)));
    const oracle = new FileTraceOracle(this.resolve(config.coverage.trace_file), locator);

    let coverage = CoverageIndex.empty();
    let changedTests = new Set<string>();
    if (executor && config.coverage.units.length > 0) {
      const refreshed = await refreshCoverage({
        units: config.coverage.units,
        store: new CoverageStore(stateDir),
        read: (file) => {
          const abs = this.resolve(file);
          return fs.existsSync(abs) ? fs.readFileSync(abs, 'utf-8') : null;
        },
        collect: (unit, hash) =>
          collectUnitCoverage(unit, hash, { oracle, executor, timeoutMs: config.execution.timeout_ms }),
      });
      coverage = refreshed.index;
      changedTests = refreshed.changedTests;
      log.info(
        { reused: refreshed.reused.length, recomputed: refreshed.recomputed.length, locations: coverage.locationCount },
        'Coverage index ready',
      );
    } else {
      log.warn('No test command or coverage units configured; every site will be uncovered');
    }

    return runMutationTesting({
      files: this.files(),
      store: this.store,
      operators: this.operators,
      coverage,
      locator,
      changedTests,
      executor: executor ?? unconfiguredExecutor,
      reloader,
      mode: request.schemata || config.schemata.enabled ? 'schemata' : 'single',
      clustering: {
        enabled: config.clustering.enabled,
        key: config.clustering.key,
        prefixDepth: config.clustering.prefix_depth,
      },
      schemata: { selector: config.schemata.selector, maxBatchSize: config.schemata.max_batch_size },
      timeoutMs: config.execution.timeout_ms,
      testConcurrency: config.execution.test_concurrency,
      stateStore: new StateStore(stateDir),
      incremental: config.incremental && !request.full,
    });
  }
}
