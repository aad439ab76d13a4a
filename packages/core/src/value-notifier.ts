import { DisposedError, ListenerError } from './errors';
import type { Equals, Listener, Unsubscribe } from './types';

export type ValueNotifierOptions<T> = {
  /** Updates equal to the current value are ignored. Defaults to `Object.is`. */
  equals?: Equals<T>;
  /** Receives listener errors. Without it, `set` throws a `ListenerError` after notifying everyone. */
  onError?: (error: unknown) => void;
};

/**
 * Holds a current value and notifies listeners synchronously after each update.
 */
export class ValueNotifier<T> {
  private current: T;
  private disposed = false;
  private readonly subs = new Set<Listener<T>>();
  private readonly equals: Equals<T>;
  private readonly onError?: (error: unknown) => void;

  constructor(initial: T, opts: ValueNotifierOptions<T> = {}) {
    this.current = initial;
    this.equals = opts.equals ?? Object.is;
    this.onError = opts.onError;
  }

  get value(): T {
    return this.current;
  }

  get listenerCount(): number {
    return this.subs.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /** Replace the value and notify listeners, unless it equals the current one. */
  set(next: T): void {
    if (this.disposed) throw new DisposedError('ValueNotifier');
    const previous = this.current;
    if (this.equals(previous, next)) return;
    this.current = next;
    this.notify(next, previous);
  }

  update(fn: (value: T) => T): void {
    this.set(fn(this.current));
  }

  /** Subscribe to updates. Returns an idempotent unsubscribe. */
  subscribe(listener: Listener<T>, opts: { fireImmediately?: boolean } = {}): Unsubscribe {
    if (this.disposed) throw new DisposedError('ValueNotifier');
    // Wrap so the same function can be subscribed twice and removed independently.
    const entry: Listener<T> = (next, previous) => listener(next, previous);
    this.subs.add(entry);
    if (opts.fireImmediately) this.invoke([entry], this.current, undefined);
    return () => {
      this.subs.delete(entry);
    };
  }

  dispose(): void {
    this.disposed = true;
    this.subs.clear();
  }

  private notify(next: T, previous: T): void {
    this.invoke(Array.from(this.subs), next, previous);
  }

  private invoke(listeners: Listener<T>[], next: T, previous: T | undefined): void {
    const errors: unknown[] = [];
    for (const fn of listeners) {
      // removed by an earlier listener during this dispatch
      if (!this.subs.has(fn)) continue;
      try {
        fn(next, previous);
      } catch (e) {
        if (this.onError) this.onError(e);
        else errors.push(e);
      }
    }
    if (errors.length) throw new ListenerError(errors);
  }
}
