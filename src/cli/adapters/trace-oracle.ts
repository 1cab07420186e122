import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { createLogger } from '../../shared/logger';
import type { FormBridgeEntry, TraceEvent, TraceOracle } from '../../shared/types';
import { FormLocator } from '../../layers/L2-coverage-index';

const log = createLogger({ layer: 'cli', module: 'trace-oracle' });

const bridgeSchema = z.array(
  z.object({
    formId: z.string().min(1),
    file: z.string().min(1),
    startLine: z.number().int().min(1),
  }),
);

/**
 * Trace lines either name the form directly or give the position the
 * runtime saw, which the form bridge resolves.
 */
const traceLineSchema = z.union([
  z.object({
    testId: z.string().min(1),
    formId: z.string().min(1),
    coordinate: z.string(),
  }),
  z.object({
    testId: z.string().min(1),
    file: z.string().min(1),
    line: z.number().int().min(1),
    coordinate: z.string(),
  }),
]);

/** Missing bridge file → no entries. */
export function loadFormBridge(filePath: string): FormBridgeEntry[] {
  if (!fs.existsSync(filePath)) return [];
  const parsed = bridgeSchema.safeParse(JSON.parse(fs.readFileSync(filePath, 'utf-8')));
  if (!parsed.success) {
    log.warn({ path: filePath, issues: parsed.error.issues.length }, 'Ignoring malformed form bridge');
    return [];
  }
  return parsed.data;
}

/** Parse NDJSON trace text. Lines that do not validate or resolve are skipped. */
export function parseTraceLines(text: string, locator: FormLocator): TraceEvent[] {
  const events: TraceEvent[] = [];
  for (const [i, line] of text.split('\n').entries()) {
    if (line.trim() === '') continue;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      log.warn({ line: i + 1, err }, 'Skipping unparseable trace line');
      continue;
    }
    const parsed = traceLineSchema.safeParse(json);
    if (!parsed.success) {
      log.warn({ line: i + 1 }, 'Skipping malformed trace line');
      continue;
    }
    const event = parsed.data;
    if ('formId' in event) {
      events.push(event);
      continue;
    }
    const formId = locator.locate(event.file, event.line);
    if (formId === undefined) {
      log.debug({ file: event.file, line: event.line }, 'Trace position matches no known form');
      continue;
    }
    events.push({ testId: event.testId, formId, coordinate: event.coordinate });
  }
  return events;
}

/** Reads the trace file the instrumented runtime appends to. */
export class FileTraceOracle implements TraceOracle {
  constructor(
    private readonly tracePath: string,
    private readonly locator: FormLocator = FormLocator.fromBridge([]),
  ) {}

  reset(): void {
    fs.mkdirSync(path.dirname(this.tracePath), { recursive: true });
    fs.writeFileSync(this.tracePath, '');
  }

  drain(): TraceEvent[] {
    if (!fs.existsSync(this.tracePath)) return [];
    const events = parseTraceLines(fs.readFileSync(this.tracePath, 'utf-8'), this.locator);
    fs.writeFileSync(this.tracePath, '');
    return events;
  }
}
