import { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { createDiagnosticCollector, formatLocation, formatStylesheet, parseStylesheet } from '@stylewright/core';
import { readStylesheetFile } from '../utils/files.js';
import { error, success } from '../output/reporters.js';

/**
 * Parse and print back: one declaration per line, values in canonical form,
 * rules sorted by specificity. Declarations that fail to parse are dropped.
 */
export function createFormatCommand(): Command {
  return new Command('format')
    .description('Print the normalized form of a stylesheet')
    .argument('<file>', 'Stylesheet to format')
    .option('-w, --write', 'Overwrite the file instead of printing')
    .action(async (file: string, options: { write?: boolean }) => {
      const cwd = process.cwd();

      try {
        const collector = createDiagnosticCollector();
        const sheet = parseStylesheet(await readStylesheetFile(file, cwd), { fileName: file, sink: collector });
        const formatted = formatStylesheet(sheet);

        // Dropped declarations are reported on stderr so stdout stays usable
        for (const d of collector.diagnostics) {
          console.error(`${d.message} ${formatLocation(d.location, d.file)}`);
        }

        if (options.write) {
          await writeFile(resolve(cwd, file), formatted, 'utf-8');
          success(`Formatted ${file}`);
        } else {
          process.stdout.write(formatted);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        error(`Format failed: ${message}`);
        process.exitCode = 1;
      }
    });
}
