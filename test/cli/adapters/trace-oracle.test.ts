import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileTraceOracle, loadFormBridge, parseTraceLines } from '../../../src/cli/adapters/trace-oracle';
import { FormLocator } from '../../../src/layers/L2-coverage-index';

const locator = FormLocator.fromBridge([
  { formId: 'src/calc.clj::defn add', file: 'src/calc.clj', startLine: 3 },
  { formId: 'src/calc.clj::defn neg?', file: 'src/calc.clj', startLine: 6 },
]);

describe('parseTraceLines', () => {
  it('keeps events that name their form', () => {
    const text = '{"testId":"calc-test/add","formId":"src/calc.clj::defn add","coordinate":"3"}\n';
    expect(parseTraceLines(text, locator)).toEqual([
      { testId: 'calc-test/add', formId: 'src/calc.clj::defn add', coordinate: '3' },
    ]);
  });

  it('resolves positional events through the form bridge', () => {
    const text = '{"testId":"calc-test/neg","file":"src/calc.clj","line":7,"coordinate":"3/1"}';
    expect(parseTraceLines(text, locator)).toEqual([
      { testId: 'calc-test/neg', formId: 'src/calc.clj::defn neg?', coordinate: '3/1' },
    ]);
  });

  it('skips blank, unparseable, malformed and unresolvable lines', () => {
    const text = [
      '',
      'not json',
      '{"testId":"t"}',
      '{"testId":"t","file":"src/calc.clj","line":1,"coordinate":"3"}',
      '{"testId":"t","file":"src/other.clj","line":9,"coordinate":"3"}',
      '{"testId":"t","file":"src/calc.clj","line":4,"coordinate":"2"}',
    ].join('\n');
    expect(parseTraceLines(text, locator)).toEqual([
      { testId: 't', formId: 'src/calc.clj::defn add', coordinate: '2' },
    ]);
  });
});

describe('file-backed tracing', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mutaform-trace-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads a form bridge and ignores a missing or malformed one', () => {
    const bridgePath = path.join(dir, 'bridge.json');
    expect(loadFormBridge(bridgePath)).toEqual([]);

    fs.writeFileSync(bridgePath, JSON.stringify([{ formId: 'f', file: 'src/a.clj', startLine: 2 }]));
    expect(loadFormBridge(bridgePath)).toEqual([{ formId: 'f', file: 'src/a.clj', startLine: 2 }]);

    fs.writeFileSync(bridgePath, JSON.stringify([{ formId: 'f', file: 'src/a.clj', startLine: 0 }]));
    expect(loadFormBridge(bridgePath)).toEqual([]);
  });

  it('resets, drains and empties the trace file', () => {
    const tracePath = path.join(dir, 'nested', 'trace.ndjson');
    const oracle = new FileTraceOracle(tracePath, locator);

    expect(oracle.drain()).toEqual([]);

    oracle.reset();
    expect(fs.readFileSync(tracePath, 'utf-8')).toBe('');

    fs.appendFileSync(tracePath, '{"testId":"a","formId":"f","coordinate":""}\n');
    expect(oracle.drain()).toEqual([{ testId: 'a', formId: 'f', coordinate: '' }]);
    expect(fs.readFileSync(tracePath, 'utf-8')).toBe('');
    expect(oracle.drain()).toEqual([]);
  });
});
