import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CatalogHandle } from '../catalog/catalogHandle';
import { DEFAULT_CATALOG_PATH } from '../config';
import { createAnalyzer } from '../engine/analyzer';
import { parseBatchInput, runBatch, summarize } from './runBatch';

const analyzer = createAnalyzer({ catalog: CatalogHandle.fromFile(DEFAULT_CATALOG_PATH) });

describe('parseBatchInput', () => {
  it('reads JSON strings and objects', () => {
    const items = parseBatchInput('cases.json', '["first", {"id": "c2", "text": "second"}, {"text": "third"}]');
    expect(items).toEqual([
      { id: 'item-1', text: 'first' },
      { id: 'c2', text: 'second' },
      { id: 'item-3', text: 'third' }
    ]);
  });

  it('reads one statement per non-blank line', () => {
    expect(parseBatchInput('cases.txt', 'first\n\n  second  \r\nthird\n')).toEqual([
      { id: 'line-1', text: 'first' },
      { id: 'line-2', text: 'second' },
      { id: 'line-3', text: 'third' }
    ]);
  });

  it('rejects JSON of the wrong shape', () => {
    expect(() => parseBatchInput('cases.json', '{"text": "x"}')).toThrow(/^Invalid batch file cases\.json: /);
  });
});

describe('summarize', () => {
  it('counts levels and averages readiness', () => {
    const results = analyzer.analyzeMany([
      'The system should load fast and handle errors properly',
      'User logs in with valid user ID and password'
    ]);
    expect(summarize(results)).toEqual({
      total: 2,
      failed: 0,
      byLevel: { Ready: 1, NeedsClarification: 1, HighRisk: 0 },
      averageReadiness: 78.8
    });
  });

  it('handles an empty batch', () => {
    expect(summarize([])).toEqual({
      total: 0,
      failed: 0,
      byLevel: { Ready: 0, NeedsClarification: 0, HighRisk: 0 },
      averageReadiness: 0
    });
  });
});

describe('runBatch', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'batch-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes the run to the runs directory', () => {
    const input = path.join(dir, 'cases.txt');
    fs.writeFileSync(input, 'User logs in with valid user ID and password\nVerify the login page title\n');

    const { run, file } = runBatch({ input, name: 'smoke', runsDir: path.join(dir, 'runs'), analyzer });

    expect(file).toBe(path.join(dir, 'runs', 'smoke.json'));
    expect(run.catalogVersion).toBe('1.0.0');
    expect(run.summary).toEqual({
      total: 2,
      failed: 0,
      byLevel: { Ready: 2, NeedsClarification: 0, HighRisk: 0 },
      averageReadiness: 95
    });
    expect(run.results.map(r => [r.id, 'report' in r ? r.report.readiness_score : r.error])).toEqual([['line-1', 90], ['line-2', 100]]);

    const saved: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    expect(saved).toMatchObject({ name: 'smoke', summary: { total: 2 } });
  });

  it('records a failing statement and keeps going', () => {
    const input = path.join(dir, 'cases.json');
    fs.writeFileSync(input, JSON.stringify([
      'User logs in with valid user ID and password',
      'bad \uDC00 text',
      'The system should load fast'
    ]));

    const { run, file } = runBatch({ input, name: 'partial', runsDir: path.join(dir, 'runs'), analyzer });

    expect(fs.existsSync(file)).toBe(true);
    expect(run.results.map(r => [r.id, 'report' in r ? r.report.readiness_score : r.error])).toEqual([
      ['item-1', 90],
      ['item-2', 'Input is not valid UTF-16 text (unpaired surrogate)'],
      ['item-3', 82.5]
    ]);
    expect(run.summary).toEqual({
      total: 3,
      failed: 1,
      byLevel: { Ready: 2, NeedsClarification: 0, HighRisk: 0 },
      averageReadiness: 86.3
    });
  });
});
