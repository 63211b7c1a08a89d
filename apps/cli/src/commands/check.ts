import { Command, Option } from 'commander';
import type { Ora } from 'ora';
import {
  createDiagnosticCollector,
  parseStylesheet,
  type Diagnostic,
} from '@stylewright/core';
import { loadConfig } from '../config/loader.js';
import { FailOnSchema, type FailOn } from '../config/schema.js';
import { discoverFiles, readStylesheetFile } from '../utils/files.js';
import { error, header, info, newline, setJsonMode, spinner, success, block } from '../output/reporters.js';
import { formatDiagnosticList, formatJson } from '../output/formatters.js';

export interface FileCheckResult {
  file: string;
  rules: number;
  diagnostics: Diagnostic[];
}

export interface CheckSummary {
  files: number;
  errors: number;
  warnings: number;
}

/**
 * Parse each file and collect what the parser reported
 */
export async function checkFiles(files: string[], cwd: string): Promise<FileCheckResult[]> {
  const results: FileCheckResult[] = [];
  for (const file of files) {
    const collector = createDiagnosticCollector();
    const text = await readStylesheetFile(file, cwd);
    const sheet = parseStylesheet(text, { fileName: file, sink: collector });
    results.push({ file, rules: sheet.rules.length, diagnostics: [...collector.diagnostics] });
  }
  return results;
}

export function summarize(results: FileCheckResult[]): CheckSummary {
  const summary: CheckSummary = { files: results.length, errors: 0, warnings: 0 };
  for (const result of results) {
    for (const d of result.diagnostics) {
      if (d.severity === 'error') summary.errors++;
      else summary.warnings++;
    }
  }
  return summary;
}

/**
 * `malformed` fails on errors, `unsupported` on warnings too
 */
export function shouldFail(summary: CheckSummary, failOn: FailOn): boolean {
  switch (failOn) {
    case 'malformed':
      return summary.errors > 0;
    case 'unsupported':
      return summary.errors + summary.warnings > 0;
    case 'never':
      return false;
  }
}

export function createCheckCommand(): Command {
  return new Command('check')
    .description('Parse stylesheets and report malformed or unsupported CSS')
    .argument('[files...]', 'Files or glob patterns (defaults to the configured include patterns)')
    .addOption(new Option('--fail-on <level>', 'Exit 1 on: malformed, unsupported, never').choices(FailOnSchema.options))
    .option('--json', 'Output as JSON')
    .action(async (files: string[], options: { failOn?: FailOn; json?: boolean }) => {
      const cwd = process.cwd();
      let spin: Ora | undefined;

      try {
        const { config } = await loadConfig(cwd);
        const json = options.json === true || config.output.format === 'json';
        setJsonMode(json);

        spin = spinner('Finding stylesheets...');
        const paths = await discoverFiles(files.length > 0 ? files : config.include, {
          cwd,
          ignore: config.ignore,
        });
        spin.text = `Checking ${paths.length} file${paths.length === 1 ? '' : 's'}...`;
        const results = await checkFiles(paths, cwd);
        spin.stop();

        const summary = summarize(results);
        const failed = shouldFail(summary, options.failOn ?? config.failOn);

        if (json) {
          console.log(formatJson({ files: results, summary }));
        } else {
          for (const result of results) {
            if (result.diagnostics.length === 0) continue;
            header(result.file);
            block(formatDiagnosticList(result.diagnostics));
          }
          newline();
          if (paths.length === 0) {
            info('No stylesheets matched');
          } else if (summary.errors + summary.warnings === 0) {
            success(`${summary.files} file${summary.files === 1 ? '' : 's'} checked, no problems`);
          } else {
            const line = `${summary.errors} error${summary.errors === 1 ? '' : 's'}, ${summary.warnings} warning${summary.warnings === 1 ? '' : 's'} in ${summary.files} file${summary.files === 1 ? '' : 's'}`;
            (failed ? error : info)(line);
          }
        }

        if (failed) process.exitCode = 1;
      } catch (err) {
        spin?.stop();
        const message = err instanceof Error ? err.message : String(err);
        error(`Check failed: ${message}`);
        process.exitCode = 1;
      }
    });
}
