/**
 * @fileoverview Feature scaffolding
 *
 * Renders the template tree under `templates/` into a new feature:
 *
 * ```
 * templates/feature/**  →  <appRoot>/features/<feature>/**
 * templates/core/**     →  <appRoot>/core/**
 * ```
 *
 * `[entity]` and `[feature]` in template paths and `{{…}}` placeholders in
 * template text are replaced; the `.tpl` suffix is dropped. Files that
 * already exist are left alone.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

import { consoleLogger, ILogger } from '../../application/logging';
import { ConfigurationError, FileNaming, LayerkitConfig, resolveConfig } from '../config';

export const DEFAULT_TEMPLATES_DIR = path.resolve(__dirname, '../../../templates');

const TEMPLATE_TARGETS: Record<string, (feature: string) => string> = {
  feature: (feature) => `features/${feature}`,
  core: () => 'core',
};

export interface ScaffoldOptions {
  /** Project root */
  rootDir: string;

  /** Feature directory name, in the configured file naming */
  feature: string;

  /** Entity type name in PascalCase; derived from the feature when omitted */
  entity?: string;

  config?: LayerkitConfig;
  templatesDir?: string;
  logger?: ILogger;
}

export interface ScaffoldResult {
  readonly feature: string;
  readonly entity: string;
  /** Project-relative paths written */
  readonly created: readonly string[];
  /** Project-relative paths that already existed */
  readonly skipped: readonly string[];
}

export type TemplateVariables = Readonly<Record<string, string>>;

const FEATURE_PATTERNS: Record<FileNaming, RegExp> = {
  snake_case: /^[a-z][a-z0-9]*(_[a-z0-9]+)*$/,
  'kebab-case': /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/,
};

export function toSnakeCase(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z])([A-Z][a-z])/g, '$1_$2')
    .replace(/-/g, '_')
    .toLowerCase();
}

export function toPascalCase(name: string): string {
  return name
    .split(/[_-]/)
    .filter((word) => word !== '')
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join('');
}

/**
 * `articles` → `Article`, `reading_list` → `ReadingList`.
 */
export function deriveEntityName(feature: string): string {
  const words = feature.split(/[_-]/).filter((word) => word !== '');
  const last = words.length - 1;
  if (last >= 0 && words[last].length > 1 && words[last].endsWith('s') && !words[last].endsWith('ss')) {
    words[last] = words[last].slice(0, -1);
  }
  return toPascalCase(words.join('_'));
}

export function renderTemplate(text: string, variables: TemplateVariables): string {
  return text.replace(/\{\{\s*([A-Za-z_]+)\s*\}\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : match,
  );
}

function listTemplates(directory: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(directory, { withFileTypes: true })) {
    const full = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...listTemplates(full));
    } else if (entry.isFile() && entry.name.endsWith('.tpl')) {
      files.push(full);
    }
  }
  return files.sort();
}

/**
 * Write a new feature from the templates.
 *
 * @throws ConfigurationError for names that break the naming rules or a
 * missing templates directory
 */
export function scaffoldFeature(options: ScaffoldOptions): ScaffoldResult {
  const config = options.config ?? resolveConfig({});
  const logger = options.logger ?? consoleLogger;
  const templatesDir = options.templatesDir ?? DEFAULT_TEMPLATES_DIR;
  const { feature } = options;

  if (!FEATURE_PATTERNS[config.fileNaming].test(feature)) {
    throw new ConfigurationError(`Feature name '${feature}' is not ${config.fileNaming}`);
  }
  const entity = options.entity ?? deriveEntityName(feature);
  if (!/^[A-Z][A-Za-z0-9]*$/.test(entity)) {
    throw new ConfigurationError(`Entity name '${entity}' is not PascalCase`);
  }
  if (!fs.existsSync(templatesDir)) {
    throw new ConfigurationError(`Templates directory not found: ${templatesDir}`);
  }

  const kebab = config.fileNaming === 'kebab-case';
  const toFileName = (snake: string): string => (kebab ? snake.replace(/_/g, '-') : snake);
  const entityFile = toSnakeCase(entity);

  const variables: TemplateVariables = {
    Entity: entity,
    entity: entity[0].toLowerCase() + entity.slice(1),
    entity_file: entityFile,
    ENTITY: entityFile.toUpperCase(),
    feature,
    Feature: toPascalCase(feature),
  };

  // Render every template path first so that imports can be renamed to match.
  const planned: Array<{ template: string; relative: string }> = [];
  for (const [area, target] of Object.entries(TEMPLATE_TARGETS)) {
    const areaDir = path.join(templatesDir, area);
    if (!fs.existsSync(areaDir)) continue;

    for (const template of listTemplates(areaDir)) {
      const inner = path
        .relative(areaDir, template)
        .split(path.sep)
        .join('/')
        .replace(/\.tpl$/, '')
        .replace(/\[entity\]/g, entityFile)
        .replace(/\[feature\]/g, toSnakeCase(feature));
      const renamed = inner
        .split('/')
        .map((segment) => toFileName(segment))
        .join('/');
      planned.push({ template, relative: `${target(feature)}/${renamed}` });
    }
  }

  const snakeStems = planned.map(({ relative }) =>
    path.posix.basename(relative).replace(/\.[^.]+$/, '').replace(/-/g, '_'),
  );

  const created: string[] = [];
  const skipped: string[] = [];

  for (const { template, relative } of planned) {
    const projectRelative = path.posix.join(config.appRoot, relative);
    const destination = path.join(options.rootDir, ...projectRelative.split('/'));

    if (fs.existsSync(destination)) {
      logger.warn(`Skipping ${projectRelative}: file already exists`);
      skipped.push(projectRelative);
      continue;
    }

    let content = renderTemplate(fs.readFileSync(template, 'utf8'), variables);
    if (kebab) {
      for (const stem of snakeStems) {
        content = content.split(`/${stem}'`).join(`/${toFileName(stem)}'`);
      }
    }

    fs.mkdirSync(path.dirname(destination), { recursive: true });
    fs.writeFileSync(destination, content, { flag: 'wx' });
    logger.info(`Created ${projectRelative}`);
    created.push(projectRelative);
  }

  return { feature, entity, created, skipped };
}
