/**
 * @fileoverview Screen controller base class
 *
 * ## Architectural Layer: PRESENTATION
 *
 * One controller per screen, registered as a Factory so every screen
 * instance gets its own. A controller receives use cases through its
 * constructor, exposes state as {@link Observable}s and never touches data
 * sources or repository implementations.
 *
 * ✅ CAN:
 * - call use cases and domain repository contracts
 * - own observables and expose them read-only
 *
 * ❌ CANNOT:
 * - import data-layer code (models, data sources, repository implementations)
 * - throw failures; they are state
 *
 * @example
 * ```typescript
 * class ArticleController extends Controller {
 *   readonly article = this.observable<ViewState<Article>>(ViewStates.initial());
 *
 *   constructor(private readonly getArticle: GetArticle, private readonly id: string) {
 *     super();
 *   }
 *
 *   protected async onInit(): Promise<void> {
 *     await this.load(this.article, () => this.getArticle.execute({ id: this.id }));
 *   }
 * }
 * ```
 */

import { AppFailure, UnexpectedFailure } from '../../domain/failures';
import { Result } from '../../domain/result';
import { Equality, Observable, ViewState, ViewStates } from '../state';

export type ControllerStatus = 'created' | 'active' | 'closed';

export abstract class Controller {
  private readonly owned: Array<() => void> = [];
  private _status: ControllerStatus = 'created';

  get status(): ControllerStatus {
    return this._status;
  }

  /**
   * Run {@link onInit} once. Later calls do nothing.
   */
  async init(): Promise<void> {
    if (this._status !== 'created') return;
    this._status = 'active';
    await this.onInit();
  }

  /**
   * Run {@link onClose} and dispose every owned observable.
   */
  async close(): Promise<void> {
    if (this._status === 'closed') return;
    this._status = 'closed';
    try {
      await this.onClose();
    } finally {
      for (const dispose of this.owned.splice(0)) {
        dispose();
      }
    }
  }

  /**
   * Controllers also work as scoped services: the container calls this.
   */
  dispose(): Promise<void> {
    return this.close();
  }

  protected onInit(): void | Promise<void> {}

  protected onClose(): void | Promise<void> {}

  /**
   * Create an observable that is disposed with the controller.
   */
  protected observable<T>(initial: T, equals?: Equality<T>): Observable<T> {
    const observable = new Observable(initial, equals);
    this.owned.push(() => observable.dispose());
    return observable;
  }

  /**
   * Move `state` through loading to success or failure.
   *
   * If `operation` throws instead of returning a failure, the state becomes
   * an unexpected failure and the error is rethrown.
   */
  protected async load<T>(
    state: Observable<ViewState<T>>,
    operation: () => Promise<Result<AppFailure, T>>,
  ): Promise<Result<AppFailure, T>> {
    state.set(ViewStates.loading());

    let result: Result<AppFailure, T>;
    try {
      result = await operation();
    } catch (error) {
      state.set(ViewStates.failure(new UnexpectedFailure()));
      throw error;
    }

    state.set(ViewStates.fromResult(result));
    return result;
  }
}
