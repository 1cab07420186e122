import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { createLogger } from '../../shared/logger';
import type { EquivalentSite, SiteResult } from '../../shared/types';
import type { DigestTable } from './change-detector';

const log = createLogger({ layer: 'L6', module: 'state-store' });

const STATE_FILE = 'state.json';

const siteResultSchema = z.object({
  site_id: z.string(),
  file: z.string(),
  form_id: z.string(),
  line: z.number().int(),
  coordinate: z.string(),
  operator_id: z.string(),
  original: z.string(),
  replacement: z.string(),
  verdict: z.enum(['killed', 'survived', 'no-coverage', 'timeout', 'error']),
  tests: z.array(z.string()),
  decisive_test: z.string().optional(),
  propagated_from: z.string().optional(),
  reused: z.boolean().optional(),
  detail: z.string().optional(),
  duration_ms: z.number(),
});

const coordinateSchema = z.array(
  z.union([z.number().int(), z.object({ digest: z.string(), slot: z.enum(['key', 'val', 'elem']) })]),
);

const equivalentSiteSchema = z.object({
  site: z.object({
    id: z.string(),
    file: z.string(),
    form_id: z.string(),
    form_line: z.number().int(),
    line: z.number().int(),
    coordinate: coordinateSchema,
    operator_id: z.string(),
    category: z.enum(['arithmetic', 'relational', 'logical', 'conditional', 'constant', 'collection']),
    family: z.string(),
    hardness: z.number(),
    original: z.string(),
    replacement: z.string(),
    scan_order: z.number().int(),
    snapshot: z.string(),
  }),
  tag: z.literal('provably-equivalent'),
  reason: z.string(),
});

const runStateSchema = z.object({
  version: z.literal(1),
  /** Hash of the settings that shape results (operators, clustering) */
  settings_hash: z.string(),
  digests: z.record(
    z.object({
      file: z.string(),
      digest: z.string(),
      start_line: z.number().int(),
      tests: z.array(z.string()).default([]),
    }),
  ),
  /** formId → results of the sites scanned from that form */
  results: z.record(z.array(siteResultSchema)),
  /** formId → sites excluded as provably equivalent */
  equivalent: z.record(z.array(equivalentSiteSchema)).default({}),
  updated_at: z.string(),
});

export interface RunState {
  version: 1;
  settings_hash: string;
  digests: DigestTable;
  results: Record<string, SiteResult[]>;
  equivalent: Record<string, EquivalentSite[]>;
  updated_at: string;
}

/**
 * Run state persisted between incremental runs:
 *
 *   <stateDir>/state.json   digest table + per-form results and exclusions
 */
export class StateStore {
  readonly filePath: string;

  constructor(stateDir: string) {
    this.filePath = path.join(stateDir, STATE_FILE);
  }

  /** Null when no state exists or the stored document is invalid. */
  load(): RunState | null {
    if (!fs.existsSync(this.filePath)) return null;
    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      log.warn({ path: this.filePath, err }, 'Ignoring unparseable run state');
      return null;
    }
    const parsed = runStateSchema.safeParse(json);
    if (!parsed.success) {
      log.warn({ path: this.filePath, issues: parsed.error.issues.length }, 'Ignoring malformed run state');
      return null;
    }
    return parsed.data;
  }

  save(state: RunState): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tmpPath = this.filePath + '.tmp';
    fs.writeFileSync(tmpPath, JSON.stringify(state, null, 2) + '\n');
    fs.renameSync(tmpPath, this.filePath);
  }
}
