import fs from 'fs';
import type { z } from 'zod';
import { parse as parseYaml } from 'yaml';
import { CONFIG_SECTIONS, mutaformConfigSchema } from './schema';
import type {
  ClusterKeyKind,
  CoverageUnitDeclaration,
  MutaformConfig,
  PresetName,
} from '../shared/types';

export const CONFIG_FILE = '.mutaform.yml';

export interface ConfigWarning {
  field: string;
  message: string;
}

/** Config with every default filled in. */
export interface ResolvedConfig {
  sources: { include: string[]; exclude: string[] };
  operators: { preset: PresetName; include: string[]; exclude: string[] };
  clustering: { enabled: boolean; key: ClusterKeyKind; prefix_depth: number };
  schemata: { enabled: boolean; selector: string; max_batch_size: number };
  execution: { timeout_ms: number; test_concurrency: number };
  coverage: { trace_file: string; bridge_file: string; units: CoverageUnitDeclaration[] };
  incremental: boolean;
  state_dir: string;
  runner: { test_command?: string; reload_command?: string };
}

export interface LoadConfigResult {
  config: ResolvedConfig;
  warnings: ConfigWarning[];
}

export const CONFIG_DEFAULTS: ResolvedConfig = {
  sources: {
    include: ['src/**/*.clj', 'src/**/*.cljc'],
    exclude: ['**/node_modules/**', '.git/**', 'target/**', '**/*_test.clj'],
  },
  operators: {
    preset: 'standard',
    include: [],
    exclude: [],
  },
  clustering: {
    enabled: false,
    key: 'operator',
    prefix_depth: 1,
  },
  schemata: {
    enabled: false,
    selector: 'mutaform.schemata/active-mutant',
    max_batch_size: 100,
  },
  execution: {
    timeout_ms: 10_000,
    test_concurrency: 1,
  },
  coverage: {
    trace_file: '.mutaform/trace.ndjson',
    bridge_file: '.mutaform/forms.json',
    units: [],
  },
  incremental: true,
  state_dir: '.mutaform',
  runner: {},
};

/** Fill every omitted field from CONFIG_DEFAULTS (user values take precedence). */
export function resolveConfig(input: MutaformConfig): ResolvedConfig {
  const d = CONFIG_DEFAULTS;
  return {
    sources: { ...d.sources, ...input.sources },
    operators: { ...d.operators, ...input.operators },
    clustering: { ...d.clustering, ...input.clustering },
    schemata: { ...d.schemata, ...input.schemata },
    execution: { ...d.execution, ...input.execution },
    coverage: { ...d.coverage, ...input.coverage },
    incremental: input.incremental ?? d.incremental,
    state_dir: input.state_dir ?? d.state_dir,
    runner: { ...d.runner, ...input.runner },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Load and validate a .mutaform.yml configuration file.
 *
 * - Missing or empty file → defaults
 * - Invalid YAML → E502 warning + defaults
 * - Invalid values → E503 warning + section defaults
 * - Unknown keys → E503 warning with "did you mean?"
 */
export function loadMutaformConfig(filePath: string = CONFIG_FILE): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  let rawContent: string;
  try {
    rawContent = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return { config: resolveConfig({}), warnings };
  }

  if (rawContent.trim() === '') {
    return { config: resolveConfig({}), warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E502: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: resolveConfig({}), warnings };
  }

  // Only comments
  if (parsed === null || parsed === undefined) {
    return { config: resolveConfig({}), warnings };
  }

  if (!isRecord(parsed)) {
    warnings.push({ field: '_yaml', message: 'E502: Config must be a YAML mapping. Using defaults.' });
    return { config: resolveConfig({}), warnings };
  }

  const result = mutaformConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: resolveConfig(result.data), warnings };
  }

  for (const issue of result.error.issues) {
    const fieldPath = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const suggestion = findSimilarKey(key, fieldPath === '' ? CONFIG_SECTIONS : sectionKeys(fieldPath));
        const msg = suggestion
          ? `E503: Unknown key "${key}". Did you mean "${suggestion}"?`
          : `E503: Unknown key "${key}".`;
        warnings.push({ field: fieldPath ? `${fieldPath}.${key}` : key, message: msg });
      }
    } else {
      warnings.push({
        field: fieldPath || '_unknown',
        message: `E503: ${issue.message}. Using default for this field.`,
      });
    }
  }

  // Keep every section that validates on its own; the rest fall back to defaults.
  const shape: Record<string, z.ZodTypeAny> = mutaformConfigSchema.shape;
  const salvaged: Record<string, unknown> = {};
  for (const key of CONFIG_SECTIONS) {
    if (!(key in parsed)) continue;
    const section = shape[key].safeParse(parsed[key]);
    if (section.success) salvaged[key] = section.data;
  }
  const retry = mutaformConfigSchema.safeParse(salvaged);
  return { config: resolveConfig(retry.success ? retry.data : {}), warnings };
}

function sectionKeys(section: string): string[] {
  if (section === 'runner') return ['test_command', 'reload_command'];
  const defaults: Record<string, unknown> = { ...CONFIG_DEFAULTS };
  const value = defaults[section];
  return isRecord(value) ? Object.keys(value) : [];
}

function findSimilarKey(key: string, known: readonly string[]): string | null {
  const lower = key.toLowerCase();
  for (const candidate of known) {
    if (levenshtein(lower, candidate) <= 3) {
      return candidate;
    }
  }
  return null;
}

export function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}
