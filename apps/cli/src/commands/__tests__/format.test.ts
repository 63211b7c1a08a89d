import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { vol } from 'memfs';
import chalk from 'chalk';

vi.mock('node:fs/promises', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return { ...memfs.fs.promises, default: memfs.fs.promises };
});

// Import after mocks are set up
import { createFormatCommand } from '../format.js';

async function run(...args: string[]): Promise<void> {
  const program = new Command();
  program.exitOverride();
  program.configureOutput({
    writeErr: () => {},
    writeOut: () => {},
  });
  program.addCommand(createFormatCommand());
  await program.parseAsync(['node', 'stylewright', 'format', ...args]);
}

describe('format command', () => {
  beforeEach(() => {
    vol.reset();
    vol.fromJSON({ '/project/app.css': '.b.c{width:10PX}\n.a { COLOR: Red; colour: red }' });
    vi.spyOn(process, 'cwd').mockReturnValue('/project');
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    chalk.level = 0;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('prints the normalized stylesheet', async () => {
    await run('app.css');

    expect(process.stdout.write).toHaveBeenCalledWith('.a {\n  color: #ff0000;\n}\n\n.b.c {\n  width: 10px;\n}\n');
  });

  it('reports dropped declarations on stderr', async () => {
    await run('app.css');

    expect(console.error).toHaveBeenCalledWith('Failed to parse CSS property: `colour: red` app.css:2:25');
  });

  it('rewrites the file with --write', async () => {
    await run('app.css', '--write');

    expect(vol.readFileSync('/project/app.css', 'utf-8')).toBe('.a {\n  color: #ff0000;\n}\n\n.b.c {\n  width: 10px;\n}\n');
    expect(console.log).toHaveBeenCalledWith('✓ Formatted app.css');
  });
});
