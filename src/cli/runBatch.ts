import path from 'node:path';
import pc from 'picocolors';
import { z } from 'zod';
import { CFG } from '../config';
import { createAnalyzer, toReport, type RequirementAnalyzer } from '../engine/analyzer';
import { READINESS_LABELS, type AnalysisReport, type AnalysisResult, type ReadinessLevel } from '../types';
import { readText, saveJSON } from '../util/fileCache';
import { createLogger } from '../util/logger';

const logger = createLogger('Batch');

const BatchInputSchema = z.array(z.union([
  z.string(),
  z.object({ id: z.string().optional(), text: z.string() })
]));

export interface BatchItem {
  id: string;
  text: string;
}

export interface BatchSummary {
  total: number;
  failed: number;
  byLevel: Record<ReadinessLevel, number>;
  averageReadiness: number;
}

export interface BatchRun {
  name: string;
  createdAt: string;
  catalogVersion: string;
  summary: BatchSummary;
  results: BatchResult[];
}

export type BatchResult =
  | { id: string; text: string; report: AnalysisReport }
  | { id: string; text: string; error: string };

export interface RunOptions {
  input: string;
  name?: string;
  runsDir?: string;
  analyzer?: RequirementAnalyzer;
}

/** JSON arrays (strings or {id, text}) or plain text with one statement per line. */
export function parseBatchInput(file: string, content: string): BatchItem[] {
  if (path.extname(file).toLowerCase() === '.json') {
    const parsed = BatchInputSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Invalid batch file ${file}: ${parsed.error.issues[0].message} at ${parsed.error.issues[0].path.join('.')}`);
    }
    return parsed.data.map((item, i) =>
      typeof item === 'string'
        ? { id: `item-${i + 1}`, text: item }
        : { id: item.id ?? `item-${i + 1}`, text: item.text });
  }

  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean)
    .map((text, i) => ({ id: `line-${i + 1}`, text }));
}

export function summarize(results: readonly AnalysisResult[], failed = 0): BatchSummary {
  const byLevel: Record<ReadinessLevel, number> = { Ready: 0, NeedsClarification: 0, HighRisk: 0 };
  let total = 0;
  for (const r of results) {
    byLevel[r.readinessLevel]++;
    total += r.readinessScore;
  }
  const averageReadiness = results.length ? Math.round((total / results.length) * 10) / 10 : 0;
  return { total: results.length + failed, failed, byLevel, averageReadiness };
}

export function runBatch(options: RunOptions): { run: BatchRun; file: string } {
  const analyzer = options.analyzer ?? createAnalyzer();
  const items = parseBatchInput(options.input, readText(options.input));
  const name = options.name ?? `batch-${new Date().toISOString().replace(/[:.]/g, '-')}`;

  logger.info(`=== STARTING BATCH ${name} ===`);
  logger.info(`Input: ${options.input} (${items.length} statements)`);

  const analyzed: AnalysisResult[] = [];
  const results: BatchResult[] = [];
  for (const item of items) {
    try {
      const result = analyzer.analyze(item.text);
      analyzed.push(result);
      results.push({ id: item.id, text: item.text, report: toReport(result) });
      logger.debug(`${item.id}: ${result.readinessScore} ${result.readinessLevel}`);
    } catch (error) {
      // Continue with the next statement rather than failing the whole batch
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${item.id} failed:`, message);
      results.push({ id: item.id, text: item.text, error: message });
    }
  }

  const run: BatchRun = {
    name,
    createdAt: new Date().toISOString(),
    catalogVersion: analyzed[0]?.catalogVersion ?? 'n/a',
    summary: summarize(analyzed, results.length - analyzed.length),
    results
  };
  const file = saveJSON(options.runsDir ?? CFG.RUNS_DIR, name, run);

  logger.info(`=== BATCH COMPLETED: ${file} ===`);
  return { run, file };
}

function parseArgs(argv: readonly string[]): RunOptions | null {
  let input: string | undefined;
  let name: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--name') name = argv[++i];
    else input = argv[i];
  }
  return input ? { input, name } : null;
}

if (require.main === module) {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    console.log('Usage: runBatch <statements.(json|txt)> [--name <run-name>]');
    process.exit(1);
  }
  try {
    const { run } = runBatch(options);
    const { byLevel } = run.summary;
    console.log(pc.bold(`\n${run.summary.total} statements, average readiness ${run.summary.averageReadiness.toFixed(1)}`));
    console.log(`  ${pc.green(`${READINESS_LABELS.Ready}: ${byLevel.Ready}`)}`);
    console.log(`  ${pc.yellow(`${READINESS_LABELS.NeedsClarification}: ${byLevel.NeedsClarification}`)}`);
    console.log(`  ${pc.red(`${READINESS_LABELS.HighRisk}: ${byLevel.HighRisk}`)}`);
    if (run.summary.failed > 0) console.log(`  ${pc.dim(`Failed: ${run.summary.failed}`)}`);
  } catch (error) {
    logger.error('Batch failed:', error);
    process.exit(1);
  }
}
