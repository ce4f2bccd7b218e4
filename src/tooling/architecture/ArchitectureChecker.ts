/**
 * @fileoverview Architecture checker
 *
 * @module layered-app-kit/tooling/architecture
 *
 * Enforces the directory contract and the dependency direction of a
 * layered application:
 *
 * ```
 *   presentation ──► domain ◄── data
 *        ╳─────────────────────────╳       presentation and data never meet
 *
 *   features/* ──► core            core never imports features
 * ```
 *
 * | rule                  | reports                                                |
 * |-----------------------|--------------------------------------------------------|
 * | `layer-dependency`    | an import against the dependency direction             |
 * | `cross-feature`       | an import of another feature's data or presentation    |
 * | `unknown-layer`       | a feature child other than data, domain, presentation  |
 * | `misplaced-file`      | a file outside the allowed folders                     |
 * | `file-naming`         | a file name not in the configured case                 |
 * | `repository-contract` | a domain repository member not returning a Result      |
 *
 * Composition-root files (see `compositionRoots`) wire implementations to
 * contracts and are exempt from the two import rules.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { consoleLogger, ILogger } from '../../application/logging';
import { ConfigurationError, FileNaming, LayerkitConfig, resolveConfig, RuleId } from '../config';
import { resolveImport, scanImports } from './ImportScanner';
import { Layer, locate, Location, segmentsUnder } from './ProjectLayout';
import { checkRepositoryContracts } from './RepositoryContract';

export interface Violation {
  readonly rule: RuleId;

  /** Project-relative POSIX path */
  readonly file: string;

  /** 1-based; absent for whole-file problems */
  readonly line?: number;

  readonly message: string;
}

export interface ArchitectureReport {
  readonly appRoot: string;
  readonly filesChecked: number;
  readonly violations: readonly Violation[];
}

export interface ArchitectureCheckerOptions {
  /** Project root; config paths are relative to it */
  rootDir: string;

  /** Default: defaults of {@link resolveConfig} */
  config?: LayerkitConfig;

  logger?: ILogger;
}

const NAMING_PATTERNS: Record<FileNaming, RegExp> = {
  snake_case: /^[a-z][a-z0-9]*(_[a-z0-9]+)*$/,
  'kebab-case': /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/,
};

const SKIPPED_DIRECTORIES = new Set(['node_modules', 'dist', 'build', 'coverage']);

export class ArchitectureChecker {
  private readonly rootDir: string;
  private readonly config: LayerkitConfig;
  private readonly appRoot: string;
  private readonly logger: ILogger;

  constructor(options: ArchitectureCheckerOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config ?? resolveConfig({});
    this.appRoot = path.posix.normalize(this.config.appRoot.replace(/\\/g, '/')).replace(/\/+$/, '');
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Walk the app root on disk and check every source file.
   *
   * @throws ConfigurationError when the app root does not exist
   */
  check(): ArchitectureReport {
    const appDir = path.join(this.rootDir, this.appRoot);
    if (!fs.existsSync(appDir) || !fs.statSync(appDir).isDirectory()) {
      throw new ConfigurationError(`App root not found: ${appDir}`);
    }

    const sources = new Map<string, string>();
    for (const file of this.listSourceFiles(appDir)) {
      const relative = path.relative(this.rootDir, file).split(path.sep).join('/');
      sources.set(relative, fs.readFileSync(file, 'utf8'));
    }
    return this.checkSources(sources);
  }

  /**
   * Check in-memory sources keyed by project-relative POSIX path. Files
   * outside the app root, ignored suffixes and other extensions are skipped.
   */
  checkSources(sources: ReadonlyMap<string, string>): ArchitectureReport {
    const violations: Violation[] = [];
    let filesChecked = 0;

    for (const [file, text] of sources) {
      const segments = segmentsUnder(this.appRoot, file);
      if (!segments || !this.isSourceFile(file)) continue;

      filesChecked++;
      violations.push(...this.checkFile(file, segments, text));
    }

    violations.sort(
      (a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : (a.line ?? 0) - (b.line ?? 0)),
    );

    this.logger.debug(
      `Checked ${filesChecked} file(s) under ${this.appRoot}: ${violations.length} violation(s)`,
    );
    return { appRoot: this.appRoot, filesChecked, violations };
  }

  private checkFile(file: string, segments: readonly string[], text: string): Violation[] {
    const found: Violation[] = [];
    const report = (rule: RuleId, message: string, line?: number): void => {
      if (this.config.rules[rule] !== 'off') {
        found.push({ rule, file, line, message });
      }
    };

    const fileName = segments[segments.length - 1] ?? '';
    const directories = segments.slice(0, -1);
    const location = locate(directories);

    this.checkNaming(fileName, report);
    this.checkPlacement(location, directories, report);

    if (!this.isCompositionRoot(segments)) {
      for (const { specifier, line } of scanImports(text)) {
        const resolved = resolveImport(file, specifier, this.config.aliases);
        const targetSegments = resolved === undefined ? undefined : segmentsUnder(this.appRoot, resolved);
        if (targetSegments) {
          this.checkImport(location, locate(targetSegments), specifier, line, report);
        }
      }
    }

    if (location.area === 'features' && location.layer === 'domain' && location.rest[0] === 'repositories') {
      if (this.config.rules['repository-contract'] !== 'off') {
        for (const problem of checkRepositoryContracts(file, text, this.config.resultTypes)) {
          report('repository-contract', problem.message, problem.line);
        }
      }
    }

    return found;
  }

  private checkNaming(fileName: string, report: Reporter): void {
    const extension = this.config.extensions.find((ext) => fileName.endsWith(ext)) ?? '';
    const stem = fileName.slice(0, fileName.length - extension.length);
    if (!NAMING_PATTERNS[this.config.fileNaming].test(stem)) {
      report('file-naming', `File name '${fileName}' is not ${this.config.fileNaming}`);
    }
  }

  private checkPlacement(location: Location, directories: readonly string[], report: Reporter): void {
    switch (location.area) {
      case 'root':
      case 'core':
        return;

      case 'other':
        report(
          'misplaced-file',
          `'${location.folder}' is outside the directory contract; expected core/ or features/<feature>/`,
        );
        return;

      case 'features': {
        if (location.feature === undefined) {
          report('misplaced-file', 'Files under features/ must live inside a feature');
          return;
        }
        if (location.child === undefined) {
          report(
            'misplaced-file',
            `Files in feature '${location.feature}' must live under data, domain or presentation`,
          );
          return;
        }
        if (location.layer === undefined) {
          report(
            'unknown-layer',
            `Unknown layer '${location.child}' in feature '${location.feature}'; expected data, domain or presentation`,
          );
          return;
        }

        const allowed = this.config.layerFolders[location.layer];
        const folder = directories[3];
        if (folder === undefined || !allowed.includes(folder)) {
          report(
            'misplaced-file',
            `Files in the ${location.layer} layer must live in one of: ${allowed.join(', ')}`,
          );
        }
        return;
      }
    }
  }

  private checkImport(
    source: Location,
    target: Location,
    specifier: string,
    line: number,
    report: Reporter,
  ): void {
    const forbidden = forbiddenTarget(source, target);
    if (forbidden) {
      report(
        'layer-dependency',
        `The ${forbidden.from} layer must not import from ${forbidden.to}: '${specifier}'`,
        line,
      );
      return;
    }

    if (
      source.area === 'features' &&
      target.area === 'features' &&
      source.feature !== undefined &&
      target.feature !== undefined &&
      source.feature !== target.feature &&
      (target.layer === 'data' || target.layer === 'presentation')
    ) {
      report(
        'cross-feature',
        `Feature '${source.feature}' must not import the ${target.layer} layer of feature '${target.feature}': '${specifier}'`,
        line,
      );
    }
  }

  private isCompositionRoot(segments: readonly string[]): boolean {
    const relative = segments.join('/');
    const fileName = segments[segments.length - 1];
    return this.config.compositionRoots.some((entry) => {
      const normalized = entry.replace(/\/+$/, '');
      if (relative === normalized || relative.startsWith(`${normalized}/`)) {
        return true;
      }
      return !normalized.includes('/') && fileName === normalized;
    });
  }

  private isSourceFile(file: string): boolean {
    return (
      this.config.extensions.some((ext) => file.endsWith(ext)) &&
      !this.config.ignore.some((suffix) => file.endsWith(suffix))
    );
  }

  private listSourceFiles(directory: string): string[] {
    const files: string[] = [];
    for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
      const full = path.join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!entry.name.startsWith('.') && !SKIPPED_DIRECTORIES.has(entry.name)) {
          files.push(...this.listSourceFiles(full));
        }
      } else if (entry.isFile()) {
        files.push(full);
      }
    }
    return files.sort();
  }
}

type Reporter = (rule: RuleId, message: string, line?: number) => void;

function forbiddenTarget(
  source: Location,
  target: Location,
): { from: Layer | 'core'; to: Layer | 'features' } | undefined {
  if (source.area === 'core') {
    return target.area === 'features' ? { from: 'core', to: 'features' } : undefined;
  }
  if (source.area !== 'features' || target.area !== 'features' || !source.layer || !target.layer) {
    return undefined;
  }

  switch (source.layer) {
    case 'domain':
      return target.layer === 'domain' ? undefined : { from: 'domain', to: target.layer };
    case 'data':
      return target.layer === 'presentation' ? { from: 'data', to: 'presentation' } : undefined;
    case 'presentation':
      return target.layer === 'data' ? { from: 'presentation', to: 'data' } : undefined;
  }
}
