/**
 * @fileoverview Unit tests for the repository contract rule
 */

import { checkRepositoryContracts } from '../../../src';

const RESULT_TYPES = ['Result', 'AsyncResult'];

describe('checkRepositoryContracts', () => {
  it('should accept Result, Promise<Result> and aliases', () => {
    const text = [
      'export interface Repo {',
      '  a(): Result<AppFailure, string>;',
      '  b(): Promise<Result<AppFailure, string>>;',
      '  c(): AsyncResult<AppFailure, string>;',
      '  d(): PromiseLike<(Result<AppFailure, string>)>;',
      '  e(): Promise<kit.Result<AppFailure, string>>;',
      '  f: () => Result<AppFailure, void>;',
      '  readonly name: string;',
      '}',
    ].join('\n');

    expect(checkRepositoryContracts('repo.ts', text, RESULT_TYPES)).toEqual([]);
  });

  it('should check type literals and abstract classes', () => {
    const text = [
      'export type Api = {',
      '  ping(): string;',
      '};',
      'export abstract class Store {',
      '  abstract load(): Promise<Result<AppFailure, string>>;',
      '  protected abstract save(value: string): Promise<void>;',
      '  private helper(): number { return 1; }',
      '  #secret(): number { return 2; }',
      '}',
      'export class Concrete {',
      '  run(): void {}',
      '}',
    ].join('\n');

    expect(checkRepositoryContracts('repo.ts', text, RESULT_TYPES)).toEqual([
      { line: 2, message: "'Api.ping' must return Result or Promise<Result>; found 'string'" },
      {
        line: 6,
        message: "'Store.save' must return Result or Promise<Result>; found 'Promise<void>'",
      },
    ]);
  });

  it('should name the first configured result type', () => {
    const text = 'export interface Repo {\n  all(): string[];\n}';

    expect(checkRepositoryContracts('repo.ts', text, ['Either'])).toEqual([
      { line: 2, message: "'Repo.all' must return Either or Promise<Either>; found 'string[]'" },
    ]);
  });
});
