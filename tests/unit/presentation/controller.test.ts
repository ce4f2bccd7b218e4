/**
 * @fileoverview Unit tests for the screen controller base class
 */

import {
  AppFailure,
  Controller,
  NotFoundFailure,
  Observable,
  Result,
  Results,
  ViewState,
  ViewStates,
} from '../../../src';

class CounterController extends Controller {
  readonly count = this.observable<ViewState<number>>(ViewStates.initial());
  readonly events: string[] = [];

  constructor(private readonly source: () => Promise<Result<AppFailure, number>>) {
    super();
  }

  refresh(): Promise<Result<AppFailure, number>> {
    return this.load(this.count, this.source);
  }

  protected async onInit(): Promise<void> {
    this.events.push('init');
    await this.refresh();
  }

  protected onClose(): void {
    this.events.push('close');
  }
}

function statuses(observable: Observable<ViewState<number>>): string[] {
  const seen: string[] = [];
  observable.subscribe((state) => seen.push(state.status));
  return seen;
}

describe('Controller', () => {
  it('should initialise once and load its state', async () => {
    const controller = new CounterController(async () => Results.success(7));
    const seen = statuses(controller.count);

    await controller.init();
    await controller.init();

    expect(controller.status).toBe('active');
    expect(controller.events).toEqual(['init']);
    expect(seen).toEqual(['loading', 'success']);
    expect(controller.count.value).toEqual(ViewStates.success(7));
  });

  it('should expose failures as state', async () => {
    const failure = new NotFoundFailure('No counter');
    const controller = new CounterController(async () => Results.failure(failure));

    const result = await controller.refresh();

    expect(result).toBeFailureOfKind('not-found');
    expect(controller.count.value).toEqual(ViewStates.failure(failure));
  });

  it('should record an unexpected failure and rethrow when the operation throws', async () => {
    const controller = new CounterController(() => Promise.reject(new Error('bug')));

    await expect(controller.refresh()).rejects.toThrow('bug');
    expect(controller.count.value).toMatchObject({
      status: 'failure',
      failure: { kind: 'unexpected' },
    });
  });

  it('should dispose owned observables on close', async () => {
    const controller = new CounterController(async () => Results.success(1));

    await controller.close();
    await controller.dispose();

    expect(controller.status).toBe('closed');
    expect(controller.events).toEqual(['close']);
    expect(controller.count.isDisposed).toBe(true);
  });

  it('should not initialise after close', async () => {
    const source = jest.fn(async () => Results.success(1));
    const controller = new CounterController(source);

    await controller.close();
    await controller.init();

    expect(source).not.toHaveBeenCalled();
  });
});
