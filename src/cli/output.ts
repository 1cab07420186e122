/**
 * CLI output formatting utilities.
 * Respects NO_COLOR and FORCE_COLOR per https://no-color.org/
 */

import type { EquivalentSite, MutationSite, RunReport, SiteResult, Verdict } from '../shared/types';

const NO_COLOR = !!process.env.NO_COLOR || process.env.TERM === 'dumb';
const FORCE_COLOR = !!process.env.FORCE_COLOR;

function useColor(): boolean {
  if (FORCE_COLOR) return true;
  if (NO_COLOR) return false;
  return process.stdout.isTTY ?? false;
}

const ESC = '\x1b[';

const codes = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  yellow: `${ESC}33m`,
  green: `${ESC}32m`,
  cyan: `${ESC}36m`,
  boldRed: `${ESC}1;31m`,
  boldWhite: `${ESC}1;37m`,
  boldGreen: `${ESC}1;32m`,
};

function wrap(code: string, text: string): string {
  return useColor() ? `${code}${text}${codes.reset}` : text;
}

export const color = {
  red: (t: string) => wrap(codes.boldRed, t),
  yellow: (t: string) => wrap(codes.yellow, t),
  green: (t: string) => wrap(codes.green, t),
  cyan: (t: string) => wrap(codes.cyan, t),
  dim: (t: string) => wrap(codes.dim, t),
  bold: (t: string) => wrap(codes.boldWhite, t),
  boldGreen: (t: string) => wrap(codes.boldGreen, t),
};

export function verdictLabel(verdict: Verdict): string {
  switch (verdict) {
    case 'killed': return color.green('KILLED');
    case 'survived': return color.red('SURVIVED');
    case 'no-coverage': return color.dim('NO COVERAGE');
    case 'timeout': return color.yellow('TIMEOUT');
    case 'error': return color.yellow('ERROR');
  }
}

export function formatScore(score: number | null): string {
  if (score === null) return 'n/a';
  const pct = Math.round(score * 1000) / 10;
  const scoreColor = pct >= 80 ? color.boldGreen : pct >= 60 ? color.yellow : color.red;
  return scoreColor(`${pct}%`);
}

function describeSite(result: SiteResult): string {
  return `${color.cyan(`${result.file}:${result.line}`)}  ${result.operator_id}  ${result.original} → ${result.replacement}`;
}

/** Text summary: counts, score and every surviving mutant. */
export function formatRunReport(report: RunReport): string {
  const lines: string[] = [];
  const { counts } = report;

  lines.push(`  Mutation score: ${formatScore(report.score)} (${counts.killed} killed / ${counts.killed + counts.survived} scored)`);
  lines.push('');
  lines.push('  Verdicts:');
  lines.push(
    `    ${color.green(`${counts.killed} killed`)}   ${counts.survived > 0 ? color.red(`${counts.survived} survived`) : '0 survived'}   ` +
      `${counts['no-coverage']} no coverage   ${counts.timeout} timeout   ${counts.error} error`,
  );
  if (report.equivalent.length > 0) {
    lines.push(`    ${color.dim(`${report.equivalent.length} excluded as provably equivalent`)}`);
  }
  if (report.reused_forms.length > 0) {
    lines.push(`    ${color.dim(`${report.reused_forms.length} unchanged form(s) reused from the previous run`)}`);
  }

  const survivors = report.results.filter((r) => r.verdict === 'survived');
  if (survivors.length > 0) {
    lines.push('');
    lines.push('  Surviving mutants:');
    for (const result of survivors) {
      lines.push(`    ${describeSite(result)}`);
    }
  }

  const errors = report.results.filter((r) => r.verdict === 'error');
  if (errors.length > 0) {
    lines.push('');
    lines.push('  Errors:');
    for (const result of errors) {
      lines.push(`    ${describeSite(result)}${result.detail ? color.dim(` (${result.detail})`) : ''}`);
    }
  }

  return lines.join('\n');
}

/** Candidate listing for `scan`. */
export function formatScanListing(sites: readonly MutationSite[], equivalent: readonly EquivalentSite[]): string {
  const lines: string[] = [];
  for (const site of sites) {
    lines.push(`  ${color.cyan(`${site.file}:${site.line}`)}  ${site.operator_id}  ${site.original} → ${site.replacement}`);
  }
  lines.push('');
  lines.push(`  ${sites.length} mutation site${sites.length !== 1 ? 's' : ''}`);
  if (equivalent.length > 0) {
    lines.push(`  ${equivalent.length} excluded as provably equivalent`);
  }
  return lines.join('\n');
}
