export type { BlocEvent, EventOfType, Change, Transition, Listener, Unsubscribe, Equals } from './types';
export {
  UnistateError,
  ClosedError,
  DisposedError,
  HandlerError,
  CircularDependencyError,
  ListenerError,
  StorageMissingError,
  isUnistateError,
} from './errors';
export type { UnistateErrorCode } from './errors';

export { ValueNotifier } from './value-notifier';
export type { ValueNotifierOptions } from './value-notifier';

// event-driven pattern
export { BlocObserver, MultiBlocObserver } from './observer';
export { BlocBase } from './bloc-base';
export type { BlocOptions } from './bloc-base';
export { Cubit } from './cubit';
export { Bloc } from './bloc';
export type { EventHandler } from './bloc';
export type { Emitter } from './emitter';
export { concurrent, sequential, droppable, restartable, debounce } from './transformers';
export type { EventTransformer, EventDispatcher, EventJob } from './transformers';
export { ReplayCubit, ReplayBloc } from './replay';
export type { ReplayOptions } from './replay';
export { HydratedCubit, HydratedBloc, setHydratedStorage, getHydratedStorage } from './hydrated';
export type { HydratedStorage, HydratedOptions } from './hydrated';
export { InMemoryStorage } from './storage';

// provider pattern
export { AsyncValue } from './async-value';
export type { AsyncLoading, AsyncData, AsyncError, AsyncHandlers } from './async-value';
export { ProviderContainer, ProviderObserver } from './container';
export type { ProviderContainerOptions } from './container';
export {
  ProviderBase,
  Provider,
  StateProvider,
  NotifierProvider,
  FutureProvider,
  provider,
  stateProvider,
  notifierProvider,
  futureProvider,
  family,
  select,
} from './provider';
export type { ProviderOptions, Override, Family, FamilyOptions } from './provider';
export { Notifier } from './notifier';
export { StateController } from './element';
export type { ProviderInfo, ProviderKind } from './element';
export type { Ref, ProviderListenable, ProviderSubscription, ListenOptions } from './ref';
