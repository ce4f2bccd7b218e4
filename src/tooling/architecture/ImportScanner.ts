/**
 * @fileoverview Import extraction and resolution
 *
 * Imports are read with the TypeScript compiler's pre-processor, which
 * finds static imports, re-exports, `import()` and `require()` without
 * type-checking the file.
 */

import * as path from 'node:path';
import * as ts from 'typescript';

export interface ImportReference {
  /** The specifier as written */
  readonly specifier: string;

  /** 1-based line of the specifier */
  readonly line: number;
}

export function lineAt(text: string, position: number): number {
  let line = 1;
  for (let i = 0; i < position && i < text.length; i++) {
    if (text.charCodeAt(i) === 10) line++;
  }
  return line;
}

export function scanImports(text: string): ImportReference[] {
  const { importedFiles } = ts.preProcessFile(text, true, true);
  return importedFiles.map((file) => ({
    specifier: file.fileName,
    line: lineAt(text, file.pos),
  }));
}

/**
 * Resolve a specifier to a project-relative POSIX path.
 *
 * Relative specifiers resolve against the importing file, aliases against
 * the project root. Package imports resolve to `undefined`.
 *
 * @param fromFile - project-relative path of the importing file
 * @param aliases - import prefix → project-relative directory
 */
export function resolveImport(
  fromFile: string,
  specifier: string,
  aliases: Readonly<Record<string, string>> = {},
): string | undefined {
  if (specifier.startsWith('./') || specifier.startsWith('../') || specifier === '.' || specifier === '..') {
    return stripExtension(path.posix.join(path.posix.dirname(fromFile), specifier));
  }

  const prefixes = Object.keys(aliases).sort((a, b) => b.length - a.length);
  for (const prefix of prefixes) {
    if (specifier === prefix || specifier.startsWith(prefix)) {
      const target = path.posix.join(aliases[prefix], specifier.slice(prefix.length));
      return stripExtension(target);
    }
  }

  return undefined;
}

function stripExtension(target: string): string {
  return target.replace(/\.(d\.ts|tsx?|jsx?|mjs|cjs|mts|cts)$/, '');
}
