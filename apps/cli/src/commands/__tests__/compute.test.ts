import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { vol } from 'memfs';
import chalk from 'chalk';
import { StylewrightConfigSchema, type StylewrightConfigInput } from '../../config/schema.js';

vi.mock('node:fs/promises', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return { ...memfs.fs.promises, default: memfs.fs.promises };
});

vi.mock('../../config/loader.js', () => ({
  loadConfig: vi.fn(),
}));

// Import after mocks are set up
import { buildElementChain, createComputeCommand, parseElementPath } from '../compute.js';
import { loadConfig } from '../../config/loader.js';
import { setJsonMode } from '../../output/reporters.js';

const THEME = `
.app { color: red; --gap: 4px }
.button { width: var(--gap); padding: 2px }
.button:hover { color: blue }
.panel .button { height: 20px }
`;

function mockConfig(input: StylewrightConfigInput = {}): void {
  vi.mocked(loadConfig).mockResolvedValue({ config: StylewrightConfigSchema.parse(input), configPath: null });
}

async function run(...args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  program.configureOutput({
    writeErr: () => {},
    writeOut: () => {},
  });
  program.addCommand(createComputeCommand());
  await program.parseAsync(['node', 'stylewright', 'compute', ...args]);
}

describe('compute command', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
    vol.fromJSON({
      '/project/theme.css': THEME,
      '/project/vars.css': '.x { width: var(--w) }',
    });
    vi.spyOn(process, 'cwd').mockReturnValue('/project');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    chalk.level = 0;
    setJsonMode(false);
    mockConfig();
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  const jsonOutput = () => JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]));

  describe('parseElementPath', () => {
    it('splits elements on `>` and classes on spaces or dots', () => {
      expect(parseElementPath('app > panel dark > .button')).toEqual([['app'], ['panel', 'dark'], ['button']]);
      expect(parseElementPath('.a.b')).toEqual([['a', 'b']]);
    });

    it('rejects an empty element', () => {
      expect(() => parseElementPath('a > > b')).toThrow('Empty element in path `a > > b`');
    });
  });

  describe('buildElementChain', () => {
    it('nests elements and puts the state on the innermost one', () => {
      expect(buildElementChain([['a'], ['b']], { hover: true })).toEqual({
        classes: ['a'],
        children: [{ classes: ['b'], state: { hover: true } }],
      });
    });
  });

  it('prints the non-default fields of the innermost element', async () => {
    await run('theme.css', '--path', 'app > panel > button', '--json');

    expect(jsonOutput()).toEqual({
      path: 'app > panel > button',
      style: {
        color: '#ff0000',
        'child-top': '2px',
        'child-right': '2px',
        'child-bottom': '2px',
        'child-left': '2px',
        width: '4px',
        height: '20px',
      },
      affectsLayout: true,
      diagnostics: [],
    });
  });

  it('applies state flags to the innermost element', async () => {
    await run('theme.css', '--path', 'app > button', '--hover', '--json');

    const { style } = jsonOutput();
    expect(style.color).toBe('#0000ff');
    expect(style.height).toBeUndefined();
  });

  it('lists every field with --all', async () => {
    await run('theme.css', '--path', 'button', '--all', '--json');
    expect(Object.keys(jsonOutput().style)).toHaveLength(70);
  });

  it('seeds the root scope from the configured variables', async () => {
    mockConfig({ variables: { '--w': '3px' } });
    await run('vars.css', '--path', 'x', '--json');
    expect(jsonOutput().style).toEqual({ width: '3px' });
  });

  it('reports unresolved references', async () => {
    await run('vars.css', '--path', 'x', '--json');

    const output = jsonOutput();
    expect(output.style).toEqual({});
    expect(output.affectsLayout).toBe(false);
    expect(output.diagnostics.map((d: { code: string }) => d.code)).toEqual(['unresolved-var']);
  });

  it('fails on a bad path', async () => {
    await run('theme.css', '--path', '>');
    expect(console.log).toHaveBeenCalledWith('✗ Compute failed: Empty element in path `>`');
    expect(process.exitCode).toBe(1);
  });
});
