import { describe, it, expect, vi, beforeEach } from 'vitest';
import { glob } from 'glob';
import { vol } from 'memfs';
import { discoverFiles, isGlobPattern, readStylesheetFile } from '../files.js';

vi.mock('glob', () => ({
  glob: vi.fn(),
}));

vi.mock('node:fs/promises', async () => {
  const memfs = await vi.importActual<typeof import('memfs')>('memfs');
  return { ...memfs.fs.promises, default: memfs.fs.promises };
});

describe('files', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vol.reset();
  });

  describe('isGlobPattern', () => {
    it('detects wildcard characters', () => {
      expect(isGlobPattern('src/**/*.css')).toBe(true);
      expect(isGlobPattern('theme.{css,scss}')).toBe(true);
      expect(isGlobPattern('src/app.css')).toBe(false);
    });
  });

  describe('discoverFiles', () => {
    it('keeps plain paths without touching the file system', async () => {
      const files = await discoverFiles(['b.css', 'a.css'], { cwd: '/project', ignore: [] });
      expect(files).toEqual(['a.css', 'b.css']);
      expect(glob).not.toHaveBeenCalled();
    });

    it('expands patterns with the ignore list and removes duplicates', async () => {
      vi.mocked(glob).mockResolvedValue(['styles/app.css', 'styles/base.css']);

      const files = await discoverFiles(['styles/*.css', 'styles/app.css'], {
        cwd: '/project',
        ignore: ['**/dist/**'],
      });

      expect(files).toEqual(['styles/app.css', 'styles/base.css']);
      expect(glob).toHaveBeenCalledWith('styles/*.css', {
        cwd: '/project',
        ignore: ['**/dist/**'],
        nodir: true,
      });
    });
  });

  describe('readStylesheetFile', () => {
    it('reads relative to the working directory', async () => {
      vol.fromJSON({ '/project/styles/app.css': '.a { color: red }' });
      await expect(readStylesheetFile('styles/app.css', '/project')).resolves.toBe('.a { color: red }');
    });
  });
});
