import { Command } from 'commander';
import {
  computeTreeStyles,
  createDiagnosticCollector,
  describeStyle,
  parseStylesheet,
  VariableContext,
  type ElementState,
  type StyledNode,
  type StyleNode,
} from '@stylewright/core';
import { loadConfig } from '../config/loader.js';
import { readStylesheetFile } from '../utils/files.js';
import { block, error, header, keyValue, newline, setJsonMode, warning } from '../output/reporters.js';
import { formatDiagnosticList, formatJson, formatStyleTable } from '../output/formatters.js';

interface ComputeOptions {
  path: string;
  hover?: boolean;
  focus?: boolean;
  active?: boolean;
  disabled?: boolean;
  all?: boolean;
  json?: boolean;
}

/**
 * Parse an ancestor path such as `app > .panel.dark > button`: one element
 * per `>`-separated segment, each a list of class names.
 */
export function parseElementPath(path: string): string[][] {
  return path.split('>').map((segment) => {
    const classes = segment.split(/[\s.]+/).filter((name) => name.length > 0);
    if (classes.length === 0) {
      throw new Error(`Empty element in path \`${path}\``);
    }
    return classes;
  });
}

/** Nest the elements into a single chain; `state` goes on the innermost one. */
export function buildElementChain(path: string[][], state: ElementState): StyleNode {
  let node: StyleNode | null = null;
  for (let i = path.length - 1; i >= 0; i--) {
    const element: StyleNode = {
      classes: path[i],
      ...(node ? { children: [node] } : { state }),
    };
    node = element;
  }
  if (!node) throw new Error('Expected at least one element');
  return node;
}

function innermost(styled: StyledNode): StyledNode {
  let current = styled;
  while (current.children.length > 0) current = current.children[0];
  return current;
}

export function createComputeCommand(): Command {
  return new Command('compute')
    .description('Compute the style of an element from a stylesheet')
    .argument('<file>', 'Stylesheet to read')
    .requiredOption('-p, --path <elements>', 'Ancestor path of class lists, e.g. "app > panel dark > button"')
    .option('--hover', 'Element is hovered')
    .option('--focus', 'Element has focus')
    .option('--active', 'Element is active')
    .option('--disabled', 'Element is disabled')
    .option('--all', 'Show every property, not only those that differ from the defaults')
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: ComputeOptions) => {
      const cwd = process.cwd();

      try {
        const { config } = await loadConfig(cwd);
        const json = options.json === true || config.output.format === 'json';
        setJsonMode(json);

        const collector = createDiagnosticCollector();
        const sheet = parseStylesheet(await readStylesheetFile(file, cwd), { fileName: file, sink: collector });
        const state: ElementState = {
          hover: options.hover === true,
          focus: options.focus === true,
          active: options.active === true,
          disabled: options.disabled === true,
        };
        const root = buildElementChain(parseElementPath(options.path), state);
        const target = innermost(
          computeTreeStyles(sheet, root, {
            sink: collector,
            variables: VariableContext.from(Object.entries(config.variables)),
          }),
        );
        const entries = describeStyle(target.style, { all: options.all === true });

        if (json) {
          console.log(
            formatJson({
              path: options.path,
              style: Object.fromEntries(entries),
              affectsLayout: target.affectsLayout,
              diagnostics: collector.diagnostics,
            }),
          );
          return;
        }

        header(`Computed style for ${options.path}`);
        block(formatStyleTable(entries));
        newline();
        keyValue('Affects layout', target.affectsLayout ? 'yes' : 'no');
        if (collector.diagnostics.length > 0) {
          newline();
          warning(`${collector.diagnostics.length} problem${collector.diagnostics.length === 1 ? '' : 's'} while computing`);
          block(formatDiagnosticList(collector.diagnostics));
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        error(`Compute failed: ${message}`);
        process.exitCode = 1;
      }
    });
}
