/**
 * Human-readable report text. Every function here is pure: callers decide
 * where the returned string is written.
 */

import { color } from '../../cli/output';
import type { AuditCounts, Critique, FindingSeverity } from '../../shared/types';

export function severityLabel(severity: FindingSeverity): string {
  switch (severity) {
    case 'error': return color.red('ERROR');
    case 'warning': return color.yellow('WARNING');
  }
}

function indentBlock(text: string, prefix: string): string {
  return text
    .split('\n')
    .map((line) => (line.trim() ? `${prefix}${line}` : ''))
    .join('\n');
}

export function renderFileHeader(filePath: string, unitCount: number): string {
  const noun = unitCount === 1 ? 'function' : 'functions';
  return `${color.bold('Auditing')} ${color.cyan(filePath)} (${unitCount} ${noun})`;
}

/**
 * One section per function: header, findings by severity, then the
 * proposed docstring when the model sent one.
 */
export function renderCritique(unitName: string, critique: Critique): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(`  ${color.cyan(unitName)}`);

  if (critique.classification === 'ok') {
    lines.push(`    ${color.green('No concerns found')}`);
    return lines.join('\n');
  }

  for (const finding of critique.findings) {
    lines.push(`    ${severityLabel(finding.severity)}  ${finding.message}`);
  }

  if (critique.suggestedDoc) {
    lines.push('');
    lines.push('    Proposed docstring:');
    lines.push(indentBlock(critique.suggestedDoc.trim(), '      '));
  }

  return lines.join('\n');
}

/** Distinct from findings: the unit could not be audited at all. */
export function renderUnresolved(unitName: string, reason: string): string {
  return `\n  ${color.cyan(unitName)}\n    ${color.magenta('UNRESOLVED')}  ${reason}`;
}

export function renderParseFailure(filePath: string, error: Error): string {
  return `${color.red('PARSE ERROR')}  ${color.cyan(filePath)}: ${error.message}`;
}

export function renderFixFailure(unitName: string, reason: string): string {
  return `    ${color.yellow('FIX SKIPPED')}  ${unitName}: ${reason}`;
}

export function renderFixApplied(filePath: string, count: number): string {
  return `  ${color.boldGreen('Fixed')} ${count} docstring${count === 1 ? '' : 's'} in ${color.cyan(filePath)}`;
}

export function renderSummary(counts: AuditCounts): string {
  const lines: string[] = [];
  lines.push('');
  lines.push(color.bold('Summary'));
  lines.push(`  Files audited:      ${counts.filesProcessed}`);
  lines.push(`  Functions audited:  ${counts.functionsProcessed}`);
  lines.push(`  Errors:             ${counts.errors > 0 ? color.red(String(counts.errors)) : counts.errors}`);
  lines.push(`  Warnings:           ${counts.warnings > 0 ? color.yellow(String(counts.warnings)) : counts.warnings}`);
  lines.push(`  Unresolved:         ${counts.unresolved > 0 ? color.magenta(String(counts.unresolved)) : counts.unresolved}`);
  if (counts.parseFailures > 0) {
    lines.push(`  Unparsable files:   ${color.red(String(counts.parseFailures))}`);
  }
  if (counts.fixesApplied > 0 || counts.fixFailures > 0) {
    lines.push(`  Fixes applied:      ${counts.fixesApplied}${counts.fixFailures > 0 ? ` (${counts.fixFailures} skipped)` : ''}`);
  }
  if (counts.transportFailure) {
    lines.push(`  ${color.red('Run aborted: the completion service could not be reached.')}`);
  }
  return lines.join('\n');
}
