/**
 * @fileoverview Unit tests for convention tooling configuration
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { CONFIG_FILE_NAME, ConfigurationError, loadConfig, resolveConfig } from '../../../src';
import { captureError } from '../../support/capture';

describe('resolveConfig', () => {
  it('should fill in defaults', () => {
    const config = resolveConfig();

    expect(config).toEqual({
      appRoot: 'app',
      fileNaming: 'snake_case',
      aliases: {},
      compositionRoots: ['core/di', 'main.ts'],
      layerFolders: {
        domain: ['entities', 'repositories', 'usecases'],
        data: ['models', 'datasources', 'repositories'],
        presentation: ['controllers', 'pages', 'widgets', 'state'],
      },
      extensions: ['.ts', '.tsx'],
      ignore: ['.test.ts', '.spec.ts', '.d.ts'],
      resultTypes: ['Result', 'AsyncResult'],
      rules: {
        'layer-dependency': 'error',
        'cross-feature': 'error',
        'unknown-layer': 'error',
        'misplaced-file': 'error',
        'file-naming': 'error',
        'repository-contract': 'error',
      },
    });
  });

  it('should merge partial nested settings', () => {
    const config = resolveConfig({
      fileNaming: 'kebab-case',
      layerFolders: { domain: ['entities'] },
      rules: { 'file-naming': 'off' },
    });

    expect(config.fileNaming).toBe('kebab-case');
    expect(config.layerFolders.domain).toEqual(['entities']);
    expect(config.layerFolders.data).toEqual(['models', 'datasources', 'repositories']);
    expect(config.rules['file-naming']).toBe('off');
    expect(config.rules['layer-dependency']).toBe('error');
  });

  it('should reject unknown keys and bad values', () => {
    const error = captureError(
      () => resolveConfig({ appRoot: '', rules: { 'no-such-rule': 'error' } }, 'test config'),
      ConfigurationError,
    );

    expect(error.message).toMatch(/^Invalid test config:\n {2}- /);
    expect(Object.keys(error.issues).sort()).toEqual(['appRoot', 'rules']);
  });

  it('should reject extensions without a leading dot', () => {
    expect(() => resolveConfig({ extensions: ['ts'] })).toThrowErrorType(ConfigurationError);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerkit-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should use defaults when there is no config file', () => {
    expect(loadConfig(dir)).toEqual(resolveConfig());
  });

  it('should read the config file from the root', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), JSON.stringify({ appRoot: 'src/app' }));

    expect(loadConfig(dir).appRoot).toBe('src/app');
  });

  it('should read an explicit config path', () => {
    fs.writeFileSync(path.join(dir, 'custom.json'), JSON.stringify({ fileNaming: 'kebab-case' }));

    expect(loadConfig(dir, 'custom.json').fileNaming).toBe('kebab-case');
  });

  it('should fail when an explicit config file is missing', () => {
    expect(() => loadConfig(dir, 'missing.json')).toThrow(
      `Configuration file not found: ${path.join(dir, 'missing.json')}`,
    );
  });

  it('should fail on malformed JSON', () => {
    const file = path.join(dir, CONFIG_FILE_NAME);
    fs.writeFileSync(file, '{ "appRoot": ');

    expect(() => loadConfig(dir)).toThrow(new RegExp(`^Cannot read ${escapeRegExp(file)}: `));
  });

  it('should name the file in validation errors', () => {
    fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), JSON.stringify({ fileNaming: 'camelCase' }));

    expect(() => loadConfig(dir)).toThrow(/^Invalid layerkit\.config\.json:\n {2}- fileNaming: /);
  });
});

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
