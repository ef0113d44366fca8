#!/usr/bin/env node
import pc from 'picocolors';
import { createAnalyzer, toReport } from '../engine/analyzer';
import { AnnotatorError, CatalogError } from '../errors';
import type { AnalysisReport } from '../types';
import { readText } from '../util/fileCache';

export type Colors = ReturnType<typeof pc.createColors>;

const USAGE = [
  'Usage: req-readiness "<requirement text>" [--json]',
  '       req-readiness --file <path> [--json]',
  '',
  'Scores a requirement or test case for ambiguity and hidden assumptions.'
].join('\n');

function levelColor(c: Colors, level: string): (s: string) => string {
  if (level === 'Ready for automation') return c.green;
  if (level === 'Needs clarification') return c.yellow;
  return c.red;
}

export function formatReport(report: AnalysisReport, c: Colors = pc): string {
  const lines: string[] = [];
  const color = levelColor(c, report.readiness_level);

  lines.push(c.bold('Readiness'));
  lines.push('─'.repeat(50));
  lines.push(`  Readiness:   ${color(`${report.readiness_score.toFixed(1)} (${report.readiness_level})`)}`);
  lines.push(`  Ambiguity:   ${report.ambiguity_score.toFixed(1)}`);
  lines.push(`  Assumptions: ${report.assumption_score.toFixed(1)}`);
  lines.push(`  Type:        ${report.statement_type}`);
  lines.push('');

  lines.push(c.bold(`Issues (${report.issues.length})`));
  lines.push('─'.repeat(50));
  if (report.issues.length === 0) {
    lines.push('  No issues found.');
  }
  for (const issue of report.issues) {
    lines.push(`  [${issue.type}] ${issue.message} ${c.dim(`+${issue.weight}`)}`);
    if (issue.impact) lines.push(`    ${c.dim(issue.impact)}`);
  }

  if (report.suggestions.length > 0) {
    lines.push('');
    lines.push(c.bold('Clarifying questions'));
    lines.push('─'.repeat(50));
    report.suggestions.forEach((q, i) => lines.push(`  ${i + 1}. ${q}`));
  }
  return lines.join('\n');
}

export interface CliArgs {
  json: boolean;
  file?: string;
  text: string;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { json: false, text: '' };
  const words: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--json') args.json = true;
    else if (arg === '--file') args.file = argv[++i];
    else words.push(arg);
  }
  args.text = words.join(' ');
  return args;
}

export function main(argv: readonly string[]): number {
  const args = parseArgs(argv);
  let text: string;
  try {
    text = args.file ? readText(args.file) : args.text;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(pc.red(`Cannot read ${args.file}: ${reason}`));
    return 2;
  }
  if (!text.trim()) {
    console.log(USAGE);
    return 1;
  }

  try {
    const report = toReport(createAnalyzer().analyze(text));
    console.log(args.json ? JSON.stringify(report, null, 2) : formatReport(report));
    return 0;
  } catch (error) {
    if (error instanceof CatalogError) {
      console.error(pc.red(`Catalog error: ${error.message}`));
      return 2;
    }
    if (error instanceof AnnotatorError) {
      console.error(pc.red(`Annotator error: ${error.message}`));
      return 2;
    }
    throw error;
  }
}

if (require.main === module) {
  process.exit(main(process.argv.slice(2)));
}
