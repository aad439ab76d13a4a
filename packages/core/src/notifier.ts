import type { Ref } from './ref';

/** @internal Connection between a notifier and the element that owns it. */
export type NotifierHost<S> = {
  readonly ref: Ref;
  read(): S;
  write(value: S): void;
};

/**
 * Holds state and the methods that change it. `build` computes the
 * initial state and re-runs whenever a watched dependency changes.
 *
 * ```ts
 * class Counter extends Notifier<number> {
 *   build() { return 0; }
 *   increment() { this.state++; }
 * }
 * ```
 */
export abstract class Notifier<S> {
  private host: NotifierHost<S> | null = null;

  /** @internal */
  attach(host: NotifierHost<S>): void {
    if (this.host) throw new Error(`${this.constructor.name} is already attached to a provider`);
    this.host = host;
  }

  protected get ref(): Ref {
    return this.connection().ref;
  }

  protected get state(): S {
    return this.connection().read();
  }

  protected set state(value: S) {
    this.connection().write(value);
  }

  abstract build(): S;

  private connection(): NotifierHost<S> {
    if (!this.host) throw new Error(`${this.constructor.name} is not attached to a provider`);
    return this.host;
  }
}
