import { ClosedError } from './errors';
import { BlocObserver } from './observer';
import type { Change, Equals, Listener, Unsubscribe } from './types';
import { ValueNotifier } from './value-notifier';

export type BlocOptions<S> = {
  /** Label used by observers, the host and error messages. Defaults to the class name. */
  name?: string;
  /** States equal to the current one are not emitted. Defaults to `Object.is`. */
  equals?: Equals<S>;
};

/**
 * Shared core of blocs and cubits: a current state, guarded emission,
 * subscriber notification and observer reporting.
 */
export abstract class BlocBase<S> {
  /** Global observer notified by every bloc and cubit. */
  static observer: BlocObserver = new BlocObserver();

  readonly name: string;
  private readonly notifier: ValueNotifier<S>;
  private readonly equals: Equals<S>;
  private emitted = false;
  private closed = false;

  constructor(initialState: S, opts: BlocOptions<S> = {}) {
    this.name = opts.name ?? new.target.name;
    this.equals = opts.equals ?? Object.is;
    // Emission decides what is new; the notifier only fans out.
    this.notifier = new ValueNotifier(initialState, {
      equals: () => false,
      onError: e => this.addError(e),
    });
    BlocBase.observer.onCreate(this);
  }

  get state(): S {
    return this.notifier.value;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Listen to future states. The current state is not replayed. */
  subscribe(listener: Listener<S>): Unsubscribe {
    if (this.closed) return () => {};
    return this.notifier.subscribe(listener);
  }

  /** Report an error to `onError` and the observer without throwing. */
  addError(error: unknown): void {
    this.onError(error);
  }

  /** Close the bloc. Further emits throw; listeners are dropped. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    BlocBase.observer.onClose(this);
    this.notifier.dispose();
  }

  protected emit(state: S): void {
    if (this.closed) throw new ClosedError(this.name, 'emit');
    if (this.emitted && this.equals(state, this.state)) return;
    this.onChange({ currentState: this.state, nextState: state });
    this.emitted = true;
    this.notifier.set(state);
  }

  /**
   * Replace the state while restoring persisted state during construction.
   * The observer sees it as a change; `onChange` overrides do not run.
   */
  protected seed(state: S): void {
    if (this.equals(state, this.state)) return;
    BlocBase.observer.onChange(this, { currentState: this.state, nextState: state });
    this.notifier.set(state);
  }

  /** Whether `state` would be skipped by `emit` as a duplicate. */
  protected isDuplicate(state: S): boolean {
    return this.emitted && this.equals(state, this.state);
  }

  protected onChange(change: Change<S>): void {
    BlocBase.observer.onChange(this, change);
  }

  protected onError(error: unknown): void {
    BlocBase.observer.onError(this, error);
  }
}
