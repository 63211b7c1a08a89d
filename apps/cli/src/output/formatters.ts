import chalk, { type ChalkInstance } from 'chalk';
import Table from 'cli-table3';
import type { Diagnostic, DiagnosticSeverity } from '@stylewright/core';

// Severity colors
export function getSeverityColor(severity: DiagnosticSeverity): ChalkInstance {
  switch (severity) {
    case 'error':
      return chalk.red;
    case 'warning':
      return chalk.yellow;
  }
}

export function getSeverityIcon(severity: DiagnosticSeverity): string {
  switch (severity) {
    case 'error':
      return chalk.red('✗');
    case 'warning':
      return chalk.yellow('!');
  }
}

// One line per diagnostic: position, severity, message and code
export function formatDiagnosticList(diagnostics: readonly Diagnostic[]): string {
  if (diagnostics.length === 0) {
    return chalk.dim('No problems found.');
  }

  return diagnostics
    .map((d) => {
      const position = chalk.dim(`${d.location.line}:${d.location.column}`);
      const severity = getSeverityColor(d.severity)(d.severity);
      return `  ${position}  ${getSeverityIcon(d.severity)} ${severity}  ${d.message}  ${chalk.dim(d.code)}`;
    })
    .join('\n');
}

// Computed style as a two-column table
export function formatStyleTable(entries: ReadonlyArray<readonly [string, string]>): string {
  if (entries.length === 0) {
    return chalk.dim('All properties at their defaults.');
  }

  const table = new Table({
    head: [chalk.bold('Property'), chalk.bold('Value')],
    style: { head: [], border: [] },
  });

  for (const [name, value] of entries) {
    table.push([name, value]);
  }

  return table.toString();
}

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}
