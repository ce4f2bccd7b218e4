#!/usr/bin/env node
/**
 * @fileoverview `layerkit` command line
 *
 * ```
 * layerkit check [dir] [--config file] [--json]
 * layerkit scaffold <feature> [--dir dir] [--entity Name]
 * ```
 *
 * `check` exits with 1 when it finds violations, 2 on configuration errors.
 */

import * as path from 'node:path';
import { parseArgs } from 'node:util';

import { consoleLogger, createConsoleLogger, ILogger } from '../application/logging';
import {
  ArchitectureChecker,
  ConfigurationError,
  formatReport,
  loadConfig,
  scaffoldFeature,
} from '../tooling';

export const USAGE = `Usage:
  layerkit check [dir] [--config file] [--json]
  layerkit scaffold <feature> [--dir dir] [--entity Name]`;

export interface CliIo {
  out(text: string): void;
  logger: ILogger;
  cwd: string;
}

const defaultIo: CliIo = {
  out: (text) => process.stdout.write(`${text}\n`),
  logger: consoleLogger,
  cwd: process.cwd(),
};

function runCheck(args: string[], io: CliIo): number {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      json: { type: 'boolean', default: false },
    },
  });

  const rootDir = path.resolve(io.cwd, positionals[0] ?? '.');
  const config = loadConfig(rootDir, values.config);
  const report = new ArchitectureChecker({ rootDir, config, logger: io.logger }).check();

  io.out(values.json ? JSON.stringify(report, null, 2) : formatReport(report));
  return report.violations.length > 0 ? 1 : 0;
}

function runScaffold(args: string[], io: CliIo): number {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      dir: { type: 'string', short: 'd' },
      entity: { type: 'string', short: 'e' },
      config: { type: 'string', short: 'c' },
    },
  });

  const feature = positionals[0];
  if (!feature) {
    throw new ConfigurationError(`Missing feature name\n${USAGE}`);
  }

  const rootDir = path.resolve(io.cwd, values.dir ?? '.');
  const result = scaffoldFeature({
    rootDir,
    feature,
    entity: values.entity,
    config: loadConfig(rootDir, values.config),
    logger: io.logger,
  });

  io.out(
    `Scaffolded feature '${result.feature}' (entity ${result.entity}): ` +
      `${result.created.length} created, ${result.skipped.length} skipped`,
  );
  return 0;
}

/**
 * Run the CLI and return the exit code.
 */
export function main(argv: string[], io: CliIo = defaultIo): number {
  const [command, ...rest] = argv;

  try {
    switch (command) {
      case 'check':
        return runCheck(rest, io);
      case 'scaffold':
        return runScaffold(rest, io);
      case undefined:
      case 'help':
      case '--help':
      case '-h':
        io.out(USAGE);
        return command === undefined ? 2 : 0;
      default:
        io.logger.error(`Unknown command '${command}'`);
        io.out(USAGE);
        return 2;
    }
  } catch (error) {
    if (error instanceof ConfigurationError || isArgumentError(error)) {
      io.logger.error(error.message);
      return 2;
    }
    throw error;
  }
}

function isArgumentError(error: unknown): error is Error & { code: string } {
  return (
    error instanceof TypeError &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('ERR_PARSE_ARGS')
  );
}

if (require.main === module) {
  const logger = createConsoleLogger({ prefix: 'layerkit' });
  process.exitCode = main(process.argv.slice(2), { ...defaultIo, logger });
}
