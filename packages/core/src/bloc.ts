import { BlocBase, type BlocOptions } from './bloc-base';
import { createEmitter, type Emitter, type EmitterControl } from './emitter';
import { ClosedError, HandlerError } from './errors';
import { concurrent, type EventDispatcher, type EventJob, type EventTransformer } from './transformers';
import type { BlocEvent, EventOfType, Transition } from './types';

export type EventHandler<E, S> = (event: E, emit: Emitter<S>) => void | Promise<void>;

type Registration<E, S> = {
  handle: EventHandler<E, S>;
  dispatcher: EventDispatcher;
};

/**
 * Turns events into states. Subclasses register one handler per event
 * `type` with `on(...)`, usually in the constructor; callers only `add`
 * events and observe `state`.
 *
 * @example
 * ```ts
 * type CounterEvent = { type: 'increment' } | { type: 'decrement' };
 *
 * class CounterBloc extends Bloc<CounterEvent, number> {
 *   constructor() {
 *     super(0);
 *     this.on('increment', (_, emit) => emit(this.state + 1));
 *     this.on('decrement', (_, emit) => emit(this.state - 1));
 *   }
 * }
 * ```
 */
export abstract class Bloc<E extends BlocEvent, S> extends BlocBase<S> {
  /** Transformer used by `on` registrations that do not pass one. */
  static transformer: EventTransformer = concurrent();

  private readonly handlers = new Map<string, Registration<E, S>>();
  private readonly active = new Set<EmitterControl<S>>();
  private readonly inflight = new Set<Promise<void>>();
  private idleWaiters: Array<() => void> = [];
  private pending = 0;
  private closing = false;

  constructor(initialState: S, opts: BlocOptions<S> = {}) {
    super(initialState, opts);
  }

  /** Hand an event to the handler registered for its `type`. */
  add(event: E): void {
    if (this.closing || this.isClosed) throw new ClosedError(this.name, 'add');
    const registration = this.handlers.get(event.type);
    if (!registration) throw HandlerError.missing(this.name, event.type);
    this.onEvent(event);
    registration.dispatcher.dispatch(this.createJob(event, registration.handle));
  }

  /** Whether a handler is registered for events of `type`. */
  handles(type: string): boolean {
    return this.handlers.has(type);
  }

  /** Resolves once no handler is running or waiting to run. */
  async idle(): Promise<void> {
    while (this.pending > 0) {
      await new Promise<void>(resolve => this.idleWaiters.push(resolve));
      // let transformers observe the finished jobs before returning
      await Promise.allSettled(Array.from(this.inflight));
    }
  }

  /** Cancel running handlers, drop queued events, wait for in-flight work, then close. */
  override async close(): Promise<void> {
    if (this.closing || this.isClosed) return;
    this.closing = true;
    for (const control of this.active) control.cancel();
    for (const { dispatcher } of this.handlers.values()) dispatcher.close();
    await Promise.allSettled(Array.from(this.inflight));
    await super.close();
  }

  /** Register the handler for events of `type`. */
  protected on<K extends E['type']>(
    type: K,
    handler: EventHandler<EventOfType<E, K>, S>,
    transformer: EventTransformer = Bloc.transformer,
  ): void {
    if (this.handlers.has(type)) throw HandlerError.duplicate(this.name, type);
    const matches = (event: E): event is EventOfType<E, K> => event.type === type;
    this.handlers.set(type, {
      handle: (event, emit) => (matches(event) ? handler(event, emit) : undefined),
      dispatcher: transformer(),
    });
  }

  protected onEvent(event: E): void {
    BlocBase.observer.onEvent(this, event);
  }

  protected onTransition(transition: Transition<E, S>): void {
    BlocBase.observer.onTransition(this, transition);
  }

  private transition(event: E, state: S): void {
    if (this.isDuplicate(state)) return;
    this.onTransition({ currentState: this.state, event, nextState: state });
    this.emit(state);
  }

  private createJob(event: E, handle: EventHandler<E, S>): EventJob {
    this.pending++;
    const control = createEmitter<S>(
      state => this.transition(event, state),
      () => HandlerError.completed(this.name, event.type),
    );
    this.active.add(control);
    let started = false;
    let settled = false;
    const settle = () => {
      if (settled) return;
      settled = true;
      this.active.delete(control);
      this.pending--;
      if (this.pending === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    };
    const execute = async (): Promise<void> => {
      try {
        await handle(event, control.emitter);
      } catch (e) {
        this.onError(e);
      } finally {
        control.complete();
        settle();
      }
    };
    return {
      run: () => {
        if (control.emitter.isDone) {
          settle();
          return Promise.resolve();
        }
        started = true;
        const p = execute();
        this.inflight.add(p);
        void p.finally(() => this.inflight.delete(p));
        return p;
      },
      cancel: () => {
        control.cancel();
        if (!started) settle();
      },
    };
  }
}
