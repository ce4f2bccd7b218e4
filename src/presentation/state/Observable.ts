/**
 * @fileoverview Observable value holder
 *
 * A single value plus its subscribers. Controllers expose state through
 * observables; views subscribe and re-render on change.
 */

export type Listener<T> = (value: T, previous: T) => void;

export type Equality<T> = (left: T, right: T) => boolean;

export interface SubscribeOptions {
  /** Call the listener immediately with the current value */
  emitCurrent?: boolean;
}

export class Observable<T> {
  private current: T;
  private readonly equals: Equality<T>;
  private readonly listeners = new Set<Listener<T>>();
  private disposed = false;

  /**
   * @param equals - change detection; `Object.is` by default. Pass
   * `valueEquals` to ignore structurally equal replacements.
   */
  constructor(initial: T, equals: Equality<T> = Object.is) {
    this.current = initial;
    this.equals = equals;
  }

  get value(): T {
    return this.current;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  /**
   * Replace the value and notify subscribers if it changed.
   * Ignored after {@link dispose}.
   *
   * @returns whether subscribers were notified
   */
  set(next: T): boolean {
    if (this.disposed || this.equals(this.current, next)) {
      return false;
    }

    const previous = this.current;
    this.current = next;
    for (const listener of [...this.listeners]) {
      listener(next, previous);
    }
    return true;
  }

  update(fn: (current: T) => T): boolean {
    return this.set(fn(this.current));
  }

  /**
   * @returns a function that removes the listener
   */
  subscribe(listener: Listener<T>, options: SubscribeOptions = {}): () => void {
    if (this.disposed) {
      return () => undefined;
    }

    this.listeners.add(listener);
    if (options.emitCurrent) {
      listener(this.current, this.current);
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Drop every subscriber; later `set` calls are ignored.
   */
  dispose(): void {
    this.disposed = true;
    this.listeners.clear();
  }
}
