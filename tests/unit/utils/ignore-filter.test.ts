/**
 * Tests for gitignore-style filtering.
 */
import { describe, it, expect, afterEach } from 'vitest';
import {
  createIgnoreFilter,
  loadIgnoreFile,
  parseIgnoreFile,
} from '../../../src/utils/ignore-filter.js';
import { createTempTree, removeTempTree } from '../../helpers/fixtures.js';

describe('createIgnoreFilter', () => {
  const filter = createIgnoreFilter(['node_modules/', '*.d.ts', 'generated/**', '!generated/keep.ts']);

  it('should ignore directories at any depth', () => {
    expect(filter.ignores('node_modules/pg/index.js')).toBe(true);
    expect(filter.ignores('packages/api/node_modules/x.ts')).toBe(true);
  });

  it('should ignore by extension and honor negation', () => {
    expect(filter.ignores('src/types.d.ts')).toBe(true);
    expect(filter.ignores('generated/api.ts')).toBe(true);
    expect(filter.ignores('generated/keep.ts')).toBe(false);
  });

  it('should filter a list and normalize backslashes', () => {
    expect(filter.filter(['src/a.ts', 'node_modules\\b.js', 'src/c.d.ts'])).toEqual(['src/a.ts']);
  });

  it('should expose its patterns', () => {
    expect(filter.patterns()).toEqual(['node_modules/', '*.d.ts', 'generated/**', '!generated/keep.ts']);
  });
});

describe('parseIgnoreFile', () => {
  it('should skip comments and blank lines', () => {
    expect(parseIgnoreFile('# vendored\n\nvendor/\n  gen/**  \n')).toEqual(['vendor/', 'gen/**']);
  });
});

describe('loadIgnoreFile', () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) await removeTempTree(root);
    root = undefined;
  });

  it('should return no patterns without a .strataignore', async () => {
    root = await createTempTree({});

    expect(await loadIgnoreFile(root)).toEqual([]);
  });

  it('should read .strataignore', async () => {
    root = await createTempTree({ '.strataignore': 'legacy/\n# old\n' });

    expect(await loadIgnoreFile(root)).toEqual(['legacy/']);
  });
});
