import type { BlocBase } from './bloc-base';
import type { BlocEvent, Change, Transition } from './types';

/**
 * Hooks into the lifecycle of every bloc and cubit. Override what you need;
 * install through `BlocBase.observer`.
 */
export class BlocObserver {
  onCreate<S>(_bloc: BlocBase<S>): void {}

  onEvent<E extends BlocEvent, S>(_bloc: BlocBase<S>, _event: E): void {}

  onChange<S>(_bloc: BlocBase<S>, _change: Change<S>): void {}

  onTransition<E extends BlocEvent, S>(_bloc: BlocBase<S>, _transition: Transition<E, S>): void {}

  onError<S>(_bloc: BlocBase<S>, _error: unknown): void {}

  onClose<S>(_bloc: BlocBase<S>): void {}
}

/** Forwards every hook to each observer in order. */
export class MultiBlocObserver extends BlocObserver {
  constructor(private readonly observers: readonly BlocObserver[]) {
    super();
  }

  override onCreate<S>(bloc: BlocBase<S>): void {
    for (const o of this.observers) o.onCreate(bloc);
  }

  override onEvent<E extends BlocEvent, S>(bloc: BlocBase<S>, event: E): void {
    for (const o of this.observers) o.onEvent(bloc, event);
  }

  override onChange<S>(bloc: BlocBase<S>, change: Change<S>): void {
    for (const o of this.observers) o.onChange(bloc, change);
  }

  override onTransition<E extends BlocEvent, S>(bloc: BlocBase<S>, transition: Transition<E, S>): void {
    for (const o of this.observers) o.onTransition(bloc, transition);
  }

  override onError<S>(bloc: BlocBase<S>, error: unknown): void {
    for (const o of this.observers) o.onError(bloc, error);
  }

  override onClose<S>(bloc: BlocBase<S>): void {
    for (const o of this.observers) o.onClose(bloc);
  }
}
