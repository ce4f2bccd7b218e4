/**
 * @fileoverview Unit tests for import extraction, resolution and layout
 */

import { locate, resolveImport, scanImports, segmentsUnder } from '../../../src';

describe('scanImports', () => {
  it('should find every kind of import with its line', () => {
    const text = [
      "import { a } from './a';",
      "import type { B } from '../b';",
      "export { c } from './c';",
      'const d = require("./d");',
      "const e = await import('./e');",
      "import './side-effect';",
    ].join('\n');

    expect(scanImports(text)).toEqual([
      { specifier: './a', line: 1 },
      { specifier: '../b', line: 2 },
      { specifier: './c', line: 3 },
      { specifier: './d', line: 4 },
      { specifier: './e', line: 5 },
      { specifier: './side-effect', line: 6 },
    ]);
  });

  it('should report the line of a multi-line import specifier', () => {
    const text = ['import {', '  a,', '  b,', "} from './ab';"].join('\n');

    expect(scanImports(text)).toEqual([{ specifier: './ab', line: 4 }]);
  });
});

describe('resolveImport', () => {
  const from = 'app/features/articles/domain/usecases/get_article.ts';

  it('should resolve relative specifiers against the importing file', () => {
    expect(resolveImport(from, '../entities/article')).toBe(
      'app/features/articles/domain/entities/article',
    );
    expect(resolveImport(from, '../../data/models/article_model.js')).toBe(
      'app/features/articles/data/models/article_model',
    );
    expect(resolveImport(from, '.')).toBe('app/features/articles/domain/usecases');
  });

  it('should resolve the longest matching alias', () => {
    const aliases = { '@/': 'app/', '@/features/': 'app/features/' };

    expect(resolveImport(from, '@/core/network/api_config', aliases)).toBe(
      'app/core/network/api_config',
    );
    expect(resolveImport(from, '@/features/comments/data/x.ts', aliases)).toBe(
      'app/features/comments/data/x',
    );
  });

  it('should leave package imports unresolved', () => {
    expect(resolveImport(from, 'zod')).toBeUndefined();
    expect(resolveImport(from, 'layered-app-kit', { '@/': 'app/' })).toBeUndefined();
  });
});

describe('project layout', () => {
  it('should split paths under the app root', () => {
    expect(segmentsUnder('app', 'app/core/di/container.ts')).toEqual(['core', 'di', 'container.ts']);
    expect(segmentsUnder('app', 'app')).toEqual([]);
    expect(segmentsUnder('app', 'application/x.ts')).toBeUndefined();
  });

  it('should locate areas, features and layers', () => {
    expect(locate([])).toEqual({ area: 'root' });
    expect(locate(['core', 'network'])).toEqual({ area: 'core' });
    expect(locate(['shared'])).toEqual({ area: 'other', folder: 'shared' });
    expect(locate(['features', 'articles', 'domain', 'entities'])).toEqual({
      area: 'features',
      feature: 'articles',
      child: 'domain',
      layer: 'domain',
      rest: ['entities'],
    });
    expect(locate(['features', 'articles', 'utils'])).toEqual({
      area: 'features',
      feature: 'articles',
      child: 'utils',
      layer: undefined,
      rest: [],
    });
  });
});
