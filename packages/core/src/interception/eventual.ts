/**
 * Eventual — allocation-light deferred result.
 *
 * An Eventual either already holds its outcome (value or error) or wraps a
 * pending PromiseLike. Settled Eventuals can be inspected synchronously via
 * `settled()`, and only allocate a Promise once somebody calls `then`.
 */

export type Settled<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown };

type EventualState<T> = Settled<T> | { status: 'pending' };

export type EventualStatus = EventualState<unknown>['status'];

export function isThenable(value: unknown): value is PromiseLike<unknown> {
  if ((typeof value !== 'object' && typeof value !== 'function') || value === null) {
    return false;
  }
  return 'then' in value && typeof value.then === 'function';
}

export class Eventual<T> implements PromiseLike<T> {
  private static readonly COMPLETED: Eventual<void> = new Eventual<void>({
    status: 'fulfilled',
    value: undefined,
  });

  private state: EventualState<T>;
  private promise: Promise<T> | undefined;

  private constructor(state: EventualState<T>, promise?: Promise<T>) {
    this.state = state;
    this.promise = promise;
  }

  static of<T>(value: T): Eventual<T> {
    return new Eventual<T>({ status: 'fulfilled', value });
  }

  /** The shared, already-completed `Eventual<void>`. */
  static completed(): Eventual<void> {
    return Eventual.COMPLETED;
  }

  static reject<T = never>(reason: unknown): Eventual<T> {
    return new Eventual<T>({ status: 'rejected', reason });
  }

  /**
   * Adopt a value, a thenable or another Eventual. Thenables stay pending until
   * they settle; the Eventual's status follows them.
   */
  static from<T>(source: T | PromiseLike<T>): Eventual<T> {
    if (source instanceof Eventual) return source;
    if (!isThenable(source)) return Eventual.of(source);

    const eventual = new Eventual<T>({ status: 'pending' });
    eventual.promise = Promise.resolve(source).then(
      (value) => {
        eventual.state = { status: 'fulfilled', value };
        return value;
      },
      (reason: unknown) => {
        eventual.state = { status: 'rejected', reason };
        throw reason;
      },
    );
    return eventual;
  }

  /** Run `fn` now; a throw becomes a rejected Eventual. */
  static capture<T>(fn: () => T): Eventual<T> {
    try {
      return Eventual.of(fn());
    } catch (err) {
      return Eventual.reject<T>(err);
    }
  }

  get status(): EventualStatus {
    return this.state.status;
  }

  get isSettled(): boolean {
    return this.state.status !== 'pending';
  }

  /** The outcome, or `undefined` while pending. */
  settled(): Settled<T> | undefined {
    const state = this.state;
    return state.status === 'pending' ? undefined : state;
  }

  toPromise(): Promise<T> {
    if (!this.promise) {
      this.promise = this.settledPromise();
    }
    return this.promise;
  }

  private settledPromise(): Promise<T> {
    const state = this.state;
    if (state.status === 'fulfilled') return Promise.resolve(state.value);
    if (state.status === 'rejected') return Promise.reject(state.reason);
    // from() always attaches a promise to pending Eventuals
    throw new Error('Pending Eventual has no source promise');
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null,
  ): Promise<TResult1 | TResult2> {
    return this.toPromise().then(onfulfilled, onrejected);
  }
}
