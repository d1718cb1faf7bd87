/**
 * Batch Report Formatter
 *
 * Renders a batch report as the plain-text report written next to the
 * submission files.
 */

import { TARGET_SCHEMAS } from '@relecov-mapper/core';
import type { BatchReport, ProcessingIssue, RecordOutcome } from '../types/index.js';

function recordLabel(outcome: RecordOutcome): string {
  const label = `Record ${outcome.index + 1}`;
  return outcome.sampleId !== undefined ? `${label} (${outcome.sampleId})` : label;
}

/**
 * One-line description of an issue
 */
export function formatIssue(issue: ProcessingIssue): string {
  switch (issue.kind) {
    case 'field-mapping-miss':
      return issue.reason === 'no-header'
        ? `no header for field ${issue.field}`
        : `header "${issue.header ?? ''}" has no usable value for ${issue.field}`;
    case 'unrecognized-header':
      return issue.suggestion !== undefined
        ? `unrecognized header "${issue.header}" (did you mean "${issue.suggestion}"?)`
        : `unrecognized header "${issue.header}"`;
    case 'enrichment-miss': {
      const detail =
        issue.reason === 'key-not-found'
          ? `no ${issue.dataset} entry for ${issue.joinField}="${issue.key ?? ''}"`
          : `${issue.joinField} is empty`;
      return `enrichment ${issue.spec} missed: ${detail}${issue.defaultsApplied ? ' (defaults applied)' : ''}`;
    }
    case 'reference-unavailable':
      return `enrichment ${issue.spec} skipped: ${issue.dataset} unavailable`;
    case 'bioinfo-field-missing':
      return `${issue.field} not set from ${issue.source}: ${issue.detail}`;
    case 'missing-required-file':
      return `missing required file ${issue.file}: ${issue.message}`;
    case 'schema-validation':
      return `rejected by ${issue.target} schema: ${issue.violations.map((v) => v.field).join(', ')}`;
    case 'processing-error':
      return `[${issue.code}] ${issue.message}`;
  }
}

/**
 * Format the batch report as text
 */
export function formatBatchReport(report: BatchReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`## Metadata Mapping Report`);
  lines.push(`Batch: ${report.id}`);
  lines.push(`Targets: ${report.targets.join(', ')}`);
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push('');

  lines.push(`### Summary`);
  lines.push(`- Records Processed: ${summary.total}`);
  lines.push(`- Succeeded: ${summary.succeeded}`);
  lines.push(`- Failed: ${summary.failed}`);
  const successRate = summary.total > 0 ? (summary.succeeded / summary.total) * 100 : 100;
  lines.push(`- Success Rate: ${successRate.toFixed(1)}%`);
  for (const target of TARGET_SCHEMAS) {
    if (report.targets.includes(target)) {
      lines.push(`- Accepted by ${target}: ${summary.emittedByTarget[target] ?? 0}`);
    }
  }
  lines.push(`- Processing Time: ${summary.processingTimeMs}ms`);
  lines.push('');

  if (report.referenceErrors.length > 0) {
    lines.push(`### Reference Datasets Unavailable`);
    for (const error of report.referenceErrors) {
      lines.push(`- ${error.dataset} [${error.code}]: ${error.message}`);
    }
    lines.push('');
  }

  const kinds = Object.entries(summary.issuesByKind)
    .map(([kind, count]): [string, number] => [kind, count ?? 0])
    .sort((a, b) => b[1] - a[1]);
  if (kinds.length > 0) {
    lines.push(`### Issues by Kind`);
    for (const [kind, count] of kinds) {
      lines.push(`- ${kind}: ${count}`);
    }
    lines.push('');
  }

  const failed = report.outcomes.filter((outcome) => outcome.status === 'failed');
  if (failed.length > 0) {
    lines.push(`### Failed Records`);
    for (const outcome of failed) {
      lines.push(`#### ${recordLabel(outcome)}`);
      for (const issue of outcome.issues) {
        if (issue.severity !== 'error') continue;
        if (issue.kind === 'schema-validation') {
          for (const violation of issue.violations) {
            lines.push(`- [${issue.target}] ${violation.field}: ${violation.message}`);
          }
        } else {
          lines.push(`- ${formatIssue(issue)}`);
        }
      }
    }
    lines.push('');
  }

  const warnings = report.outcomes.flatMap((outcome) =>
    outcome.issues
      .filter((issue) => issue.severity === 'warning')
      .map((issue) => `- ${recordLabel(outcome)}: ${formatIssue(issue)}`)
  );
  if (warnings.length > 0) {
    lines.push(`### Warnings`);
    lines.push(...warnings);
    lines.push('');
  }

  return lines.join('\n');
}
