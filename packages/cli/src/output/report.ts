/**
 * Report rendering for analysis results and batch runs
 */

import chalk from 'chalk';
import { PATTERN_CATEGORIES, identityKey } from 'lexiscan-core';

import { formatKeyValue, formatTable } from './table.js';

import type {
  AnalysisResult,
  BatchSummary,
  CategoryScores,
  DomainStats,
  ProfileComparison,
  StylisticLabel,
  TargetOutcome,
} from 'lexiscan-core';

export function formatLabel(label: StylisticLabel): string {
  return label.replace('_', ' ');
}

export function colorLabel(label: StylisticLabel, text: string = formatLabel(label)): string {
  switch (label) {
    case 'LIKELY_AI':
      return chalk.red(text);
    case 'UNCERTAIN':
      return chalk.yellow(text);
    case 'LIKELY_HUMAN':
      return chalk.green(text);
  }
}

/**
 * Category scores as `category  0.500` rows in category order
 */
export function categoryRows(scores: CategoryScores): Array<{ category: string; score: number }> {
  const rows: Array<{ category: string; score: number }> = [];
  for (const category of PATTERN_CATEGORIES) {
    const score = scores[category];
    if (score !== undefined) {rows.push({ category, score });}
  }
  return rows;
}

export interface AnalysisRenderOptions {
  verbose?: boolean;
  /** Share of the stored corpus scoring below this result */
  percentile?: number | undefined;
  profile?: { name: string; comparison: ProfileComparison } | undefined;
}

export function renderAnalysis(result: AnalysisResult, options: AnalysisRenderOptions = {}): string {
  const out: string[] = [];
  out.push(chalk.bold(identityKey(result.identity)));
  out.push(
    formatKeyValue([
      ...(result.title ? [['Title', result.title] as const] : []),
      ['Stylistic index', `${result.index}/100`],
      ['Label', colorLabel(result.label)],
      ['Words', result.wordCount],
      ...(result.publishedDate ? [['Published', result.publishedDate] as const] : []),
      ...(options.percentile !== undefined ? [['Corpus percentile', `${options.percentile}%`] as const] : []),
    ]).trimEnd()
  );
  out.push('');
  out.push(formatTable(categoryRows(result.categoryScores), ['category', 'score']).trimEnd());

  if (options.verbose) {
    out.push('');
    const rows = result.patternResults.map((r) => ({
      pattern: r.patternId,
      category: r.category,
      version: r.patternVersion,
      raw: r.rawValue,
      score: r.normalizedScore,
      detail: r.error ? `error: ${r.error}` : r.detail,
    }));
    out.push(formatTable(rows, ['pattern', 'category', 'version', 'raw', 'score', 'detail']).trimEnd());
  }

  if (options.profile) {
    const { name, comparison } = options.profile;
    out.push('');
    out.push(`Similarity to ${name}: ${(comparison.similarity * 100).toFixed(1)}%`);
  }

  for (const warning of result.warnings) {
    out.push(chalk.yellow(`warning: ${warning}`));
  }

  return out.join('\n') + '\n';
}

/**
 * Plain JSON-friendly view of a result
 */
export function analysisToJson(result: AnalysisResult): Record<string, unknown> {
  return {
    target: identityKey(result.identity),
    index: result.index,
    label: result.label,
    wordCount: result.wordCount,
    title: result.title ?? null,
    publishedDate: result.publishedDate ?? null,
    scannedAt: result.scannedAt,
    categoryScores: result.categoryScores,
    patterns: result.patternResults.map((r) => ({
      id: r.patternId,
      category: r.category,
      version: r.patternVersion,
      raw: r.rawValue,
      score: r.normalizedScore,
      detail: r.detail,
      ...(r.error ? { error: r.error } : {}),
    })),
    warnings: result.warnings,
  };
}

export function renderSummary(summary: BatchSummary): string {
  const parts = [
    chalk.green(`${summary.succeeded} succeeded`),
    summary.failed > 0 ? chalk.red(`${summary.failed} failed`) : `${summary.failed} failed`,
    `${summary.skipped} skipped`,
  ];
  if (summary.cancelled > 0) {
    parts.push(chalk.yellow(`${summary.cancelled} cancelled`));
  }
  return `${summary.total} targets: ${parts.join(', ')} (${(summary.durationMs / 1000).toFixed(1)}s)\n`;
}

/**
 * One line per failed target: `target  STAGE  message`
 */
export function renderFailures(outcomes: readonly TargetOutcome[]): string {
  const rows = outcomes.flatMap((o) =>
    o.state === 'FAILED' ? [{ target: o.target, stage: o.stage, error: `${o.error.name}: ${o.error.message}` }] : []
  );
  return rows.length === 0 ? '' : formatTable(rows, ['target', 'stage', 'error']);
}

export function renderBatchResults(outcomes: readonly TargetOutcome[]): string {
  const rows = outcomes.flatMap((o) =>
    o.state === 'PERSISTED' || o.state === 'SCORED'
      ? [{ target: o.target, index: o.result.index, label: formatLabel(o.result.label), words: o.result.wordCount }]
      : []
  );
  return rows.length === 0 ? '' : formatTable(rows, ['target', 'index', 'label', 'words']);
}

export function outcomeToJson(outcome: TargetOutcome): Record<string, unknown> {
  switch (outcome.state) {
    case 'PERSISTED':
      return { target: outcome.target, state: outcome.state, scanId: outcome.scanId, ...analysisToJson(outcome.result) };
    case 'SCORED':
      return { target: outcome.target, state: outcome.state, ...analysisToJson(outcome.result) };
    case 'FAILED':
      return {
        target: outcome.target,
        state: outcome.state,
        stage: outcome.stage,
        error: { name: outcome.error.name, message: outcome.error.message },
      };
    case 'SKIPPED':
      return { target: outcome.target, state: outcome.state, reason: outcome.reason };
    case 'CANCELLED':
      return { target: outcome.target, state: outcome.state };
  }
}

export function renderDomainStats(stats: DomainStats): string {
  return (
    chalk.bold(`Domain summary: ${stats.domain}`) +
    '\n' +
    formatKeyValue([
      ['Pages scanned', stats.scans],
      ['Mean index', `${stats.meanIndex}/100`],
      ['Range', `${stats.minIndex} – ${stats.maxIndex}`],
      [
        'Labels',
        `${stats.labels.LIKELY_AI} likely AI, ${stats.labels.UNCERTAIN} uncertain, ${stats.labels.LIKELY_HUMAN} likely human`,
      ],
      ['Last scan', stats.latestScannedAt],
    ])
  );
}
