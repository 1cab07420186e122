// === Shared Enums and Literals ===

export type Verdict = 'killed' | 'survived' | 'no-coverage' | 'timeout' | 'error';

export type VerdictState = 'pending' | Verdict;

export type TestOutcome = 'pass' | 'fail' | 'threw';

export type ReloadOutcome = 'success' | 'failure';

export type OperatorCategory =
  | 'arithmetic'
  | 'relational'
  | 'logical'
  | 'conditional'
  | 'constant'
  | 'collection';

export type PresetName = 'minimal' | 'standard' | 'all';

export type ClusterKeyKind = 'operator' | 'location' | 'shape';

export type ExecutionMode = 'single' | 'schemata';

// === Coordinates ===

export type DigestSlot = 'key' | 'val' | 'elem';

export interface DigestSegment {
  digest: string;
  slot: DigestSlot;
}

export type CoordinateSegment = number | DigestSegment;

export type Coordinate = readonly CoordinateSegment[];

// === Mutation Sites ===

export interface MutationSite {
  /** Deterministic id: `<formId>@<coordinate>:<operatorId>` */
  id: string;
  file: string;
  form_id: string;
  form_line: number;
  /** 1-based line of the targeted node */
  line: number;
  coordinate: Coordinate;
  operator_id: string;
  category: OperatorCategory;
  family: string;
  hardness: number;
  original: string;
  replacement: string;
  /** Position in scanner output; tie-breaker for clustering */
  scan_order: number;
  /** Digest of the file text the site was scanned from */
  snapshot: string;
}

export interface EquivalentSite {
  site: MutationSite;
  tag: 'provably-equivalent';
  reason: string;
}

export interface SiteResult {
  site_id: string;
  file: string;
  form_id: string;
  line: number;
  coordinate: string;
  operator_id: string;
  original: string;
  replacement: string;
  verdict: Verdict;
  /** Tests that ran (or would have run) for the site */
  tests: string[];
  /** Test that killed or timed out the mutant */
  decisive_test?: string;
  /** Set when the verdict was copied from a cluster representative */
  propagated_from?: string;
  /** Set when the verdict was carried over from a previous run */
  reused?: boolean;
  detail?: string;
  duration_ms: number;
}

export interface VerdictCounts {
  killed: number;
  survived: number;
  'no-coverage': number;
  timeout: number;
  error: number;
}

export interface RunReport {
  results: SiteResult[];
  equivalent: EquivalentSite[];
  counts: VerdictCounts;
  /** killed / (killed + survived); null when nothing was killed or survived */
  score: number | null;
  changed_forms: string[];
  reused_forms: string[];
  removed_forms: string[];
  reload_count: number;
  duration_ms: number;
}

// === Coverage ===

export interface TraceEvent {
  testId: string;
  formId: string;
  coordinate: string;
}

export interface FormBridgeEntry {
  formId: string;
  file: string;
  startLine: number;
}

export interface CoverageUnitDeclaration {
  id: string;
  tests: string[];
  /** Source files the unit's coverage depends on (tests and code under test) */
  dependencies: string[];
}

export interface CoverageUnitRecord {
  version: 1;
  unit_id: string;
  dependency_hash: string;
  tests: string[];
  /** testId → `formId|coordinate` location keys */
  records: Record<string, string[]>;
  collected_at: string;
}

// === External Services ===

export interface RunContext {
  /** Mutant selected in the loaded schemata bundle, or null for plain runs */
  activeMutant: string | null;
  signal: AbortSignal;
}

export interface TestExecutionService {
  run(testId: string, context: RunContext): Promise<TestOutcome>;
}

export interface ReloadService {
  reload(): Promise<ReloadOutcome>;
}

export interface TraceOracle {
  reset(): void | Promise<void>;
  drain(): TraceEvent[] | Promise<TraceEvent[]>;
}

// === Errors ===

export type ErrorSeverity = 'critical' | 'high' | 'medium' | 'low';

export type ErrorContext = Record<string, unknown>;

export const ERROR_CODES = {
  PARSE_ERROR: 'MUTAFORM_E200',
  LOCATION_NOT_FOUND: 'MUTAFORM_E201',
  LOCATION_AMBIGUOUS: 'MUTAFORM_E202',
  MUTATION_APPLY_FAILURE: 'MUTAFORM_E301',
  REVERT_FAILURE: 'MUTAFORM_E302',
  RELOAD_FAILURE: 'MUTAFORM_E303',
  SUBSUMPTION_CYCLE: 'MUTAFORM_E401',
  INDEX_STALENESS: 'MUTAFORM_E501',
  VERDICT_TRANSITION: 'MUTAFORM_E601',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class MutaformError extends Error {
  readonly code: ErrorCode;
  readonly severity: ErrorSeverity;
  readonly userMessage?: string;
  readonly context: ErrorContext;
  readonly cause?: Error;
  readonly retryable: boolean;
  readonly timestamp: string;

  constructor(opts: {
    code: ErrorCode;
    severity: ErrorSeverity;
    message: string;
    userMessage?: string;
    context?: ErrorContext;
    cause?: Error;
    retryable?: boolean;
  }) {
    super(opts.message);
    this.name = 'MutaformError';
    this.code = opts.code;
    this.severity = opts.severity;
    this.userMessage = opts.userMessage;
    this.context = opts.context ?? {};
    this.cause = opts.cause;
    this.retryable = opts.retryable ?? false;
    this.timestamp = new Date().toISOString();
  }
}

export function isMutaformError(err: unknown, code?: ErrorCode): err is MutaformError {
  return err instanceof MutaformError && (code === undefined || err.code === code);
}

/** Normalize an unknown thrown value into an Error for `cause` chains. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

// === Config (.mutaform.yml) ===

export interface MutaformConfig {
  sources?: {
    include?: string[];
    exclude?: string[];
  };
  operators?: {
    preset?: PresetName;
    include?: string[];
    exclude?: string[];
  };
  clustering?: {
    enabled?: boolean;
    key?: ClusterKeyKind;
    prefix_depth?: number;
  };
  schemata?: {
    enabled?: boolean;
    selector?: string;
    max_batch_size?: number;
  };
  execution?: {
    timeout_ms?: number;
    test_concurrency?: number;
  };
  coverage?: {
    trace_file?: string;
    bridge_file?: string;
    units?: CoverageUnitDeclaration[];
  };
  incremental?: boolean;
  state_dir?: string;
  runner?: {
    test_command?: string;
    reload_command?: string;
  };
}
