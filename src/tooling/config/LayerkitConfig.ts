/**
 * @fileoverview Convention tooling configuration
 *
 * Read from `layerkit.config.json` at the project root. Every field is
 * optional; missing fields take the defaults below.
 *
 * ```json
 * {
 *   "appRoot": "src/app",
 *   "fileNaming": "snake_case",
 *   "aliases": { "@app/": "src/app/" },
 *   "rules": { "file-naming": "off" }
 * }
 * ```
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as z from 'zod';

export const CONFIG_FILE_NAME = 'layerkit.config.json';

export const RULE_IDS = [
  'layer-dependency',
  'cross-feature',
  'unknown-layer',
  'misplaced-file',
  'file-naming',
  'repository-contract',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

const ruleSetting = z.enum(['error', 'off']);

export const layerkitConfigSchema = z
  .object({
    /** Application source root, relative to the project root */
    appRoot: z.string().min(1).default('app'),

    fileNaming: z.enum(['snake_case', 'kebab-case']).default('snake_case'),

    /** Import prefix → directory relative to the project root */
    aliases: z.record(z.string()).default({}),

    /**
     * Files allowed to import across layers. An entry containing `/` is a
     * path under the app root (a directory covers everything in it); an
     * entry without one matches a file name anywhere.
     */
    compositionRoots: z.array(z.string().min(1)).default(['core/di', 'main.ts']),

    /** Sub-folders allowed directly under each layer */
    layerFolders: z
      .object({
        domain: z.array(z.string()).default(['entities', 'repositories', 'usecases']),
        data: z.array(z.string()).default(['models', 'datasources', 'repositories']),
        presentation: z
          .array(z.string())
          .default(['controllers', 'pages', 'widgets', 'state']),
      })
      .strict()
      .default({}),

    /** Source file extensions */
    extensions: z.array(z.string().startsWith('.')).default(['.ts', '.tsx']),

    /** File name suffixes left out of the check */
    ignore: z.array(z.string()).default(['.test.ts', '.spec.ts', '.d.ts']),

    /** Return types accepted by the repository-contract rule */
    resultTypes: z.array(z.string().min(1)).default(['Result', 'AsyncResult']),

    rules: z
      .object({
        'layer-dependency': ruleSetting.default('error'),
        'cross-feature': ruleSetting.default('error'),
        'unknown-layer': ruleSetting.default('error'),
        'misplaced-file': ruleSetting.default('error'),
        'file-naming': ruleSetting.default('error'),
        'repository-contract': ruleSetting.default('error'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type LayerkitConfig = z.infer<typeof layerkitConfigSchema>;

export type LayerkitConfigInput = z.input<typeof layerkitConfigSchema>;

export type FileNaming = LayerkitConfig['fileNaming'];

/**
 * Thrown for configuration that cannot be used: unreadable or malformed
 * files, schema violations, bad command-line arguments.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: Readonly<Record<string, readonly string[]>> = {},
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

function describeIssues(issues: Readonly<Record<string, readonly string[]>>): string {
  return Object.entries(issues)
    .map(([key, messages]) => `\n  - ${key}: ${messages.join('; ')}`)
    .join('');
}

/**
 * Apply defaults and validate.
 *
 * @param source - named in the error message
 * @throws ConfigurationError
 */
export function resolveConfig(
  input: unknown = {},
  source: string = 'configuration',
): LayerkitConfig {
  const parsed = layerkitConfigSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const issues: Record<string, string[]> = {};
  for (const issue of parsed.error.issues) {
    const key = issue.path.join('.') || '(root)';
    (issues[key] ??= []).push(issue.message);
  }
  throw new ConfigurationError(`Invalid ${source}:${describeIssues(issues)}`, issues);
}

/**
 * Load `layerkit.config.json` from `rootDir`, or the file given.
 *
 * Without `configPath` a missing file means defaults; a named file must exist.
 *
 * @throws ConfigurationError
 */
export function loadConfig(rootDir: string, configPath?: string): LayerkitConfig {
  const file = path.resolve(rootDir, configPath ?? CONFIG_FILE_NAME);

  if (!fs.existsSync(file)) {
    if (configPath !== undefined) {
      throw new ConfigurationError(`Configuration file not found: ${file}`);
    }
    return resolveConfig({});
  }

  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read ${file}: ${reason}`);
  }

  return resolveConfig(json, path.basename(file));
}
