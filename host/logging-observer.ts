import { BlocObserver, ProviderObserver, type BlocBase, type BlocEvent, type ProviderContainer, type ProviderInfo, type Transition } from "@unistate/core";
import type { Logger } from "./logger";

export class LoggingObserver extends BlocObserver {
  constructor(private readonly log: Logger) {
    super();
  }

  override onCreate<S>(bloc: BlocBase<S>): void {
    this.log.debug({ source: bloc.name }, "bloc created");
  }

  override onTransition<E extends BlocEvent, S>(bloc: BlocBase<S>, transition: Transition<E, S>): void {
    this.log.trace({ source: bloc.name, event: transition.event.type }, "transition");
  }

  override onError<S>(bloc: BlocBase<S>, error: unknown): void {
    this.log.error({ err: error, source: bloc.name }, "bloc error");
  }

  override onClose<S>(bloc: BlocBase<S>): void {
    this.log.debug({ source: bloc.name }, "bloc closed");
  }
}

export class LoggingProviderObserver extends ProviderObserver {
  constructor(private readonly log: Logger) {
    super();
  }

  override providerDidFail(provider: ProviderInfo, error: unknown, _container: ProviderContainer): void {
    this.log.error({ err: error, source: provider.name }, "provider failed");
  }

  override didDisposeProvider(provider: ProviderInfo, _container: ProviderContainer): void {
    this.log.trace({ source: provider.name }, "provider disposed");
  }
}
