/**
 * Diagnostics
 * The engine never throws for bad stylesheet input. Every problem it skips
 * over is reported to a `DiagnosticSink` with its source location.
 */

import type { SourceLocation } from '../syntax/index.js';

export const DIAGNOSTIC_CODES = [
  'malformed-rule',
  'malformed-declaration',
  'unsupported-value',
  'unresolved-var',
  'var-depth-exceeded',
  'var-parse-failed',
] as const;

export type DiagnosticCode = (typeof DIAGNOSTIC_CODES)[number];

export type DiagnosticSeverity = 'error' | 'warning';

export interface Diagnostic {
  code: DiagnosticCode;
  severity: DiagnosticSeverity;
  message: string;
  location: SourceLocation;
  file?: string;
}

export interface DiagnosticSink {
  log(message: string, location: SourceLocation, fileName?: string, code?: DiagnosticCode): void;
}

/** Recognized CSS this engine does not implement is a warning; everything else is an error. */
export function severityOf(code: DiagnosticCode): DiagnosticSeverity {
  return code === 'unsupported-value' ? 'warning' : 'error';
}

export function formatLocation(location: SourceLocation, fileName?: string): string {
  return `${fileName ?? '<no-filename>'}:${location.line}:${location.column}`;
}

/** Default sink: one line per problem on stderr. */
export const consoleSink: DiagnosticSink = {
  log(message, location, fileName) {
    console.warn(`${message} ${formatLocation(location, fileName)}`);
  },
};

/** Discards everything. */
export const silentSink: DiagnosticSink = {
  log() {},
};

export interface DiagnosticCollector extends DiagnosticSink {
  readonly diagnostics: readonly Diagnostic[];
  clear(): void;
}

/** A sink that keeps every entry as a structured `Diagnostic`. */
export function createDiagnosticCollector(): DiagnosticCollector {
  const diagnostics: Diagnostic[] = [];
  return {
    diagnostics,
    log(message, location, fileName, code = 'malformed-declaration') {
      const diagnostic: Diagnostic = { code, severity: severityOf(code), message, location };
      if (fileName !== undefined) diagnostic.file = fileName;
      diagnostics.push(diagnostic);
    },
    clear() {
      diagnostics.length = 0;
    },
  };
}
