import type { ProviderContainer } from './container';
import type { ElementNode } from './scheduler';
import type { Listener } from './types';

export type ListenOptions = {
  /** Call the listener with the current value right away. */
  fireImmediately?: boolean;
  /** Called instead of the listener when the provider fails to build. */
  onError?: (error: unknown) => void;
};

export interface ProviderSubscription<T> {
  /** Current value; throws if the provider failed to build. */
  read(): T;
  close(): void;
}

/**
 * Anything a container or a ref can read, watch or listen to: provider
 * definitions and selections of them.
 */
export interface ProviderListenable<T> {
  /** @internal Read and record a rebuild dependency for `dependent`. */
  watchFrom(container: ProviderContainer, dependent: ElementNode): T;
  /** @internal */
  readFrom(container: ProviderContainer): T;
  /** @internal */
  listenFrom(container: ProviderContainer, listener: Listener<T>, opts: ListenOptions): ProviderSubscription<T>;
}

/** Handed to provider builds; its reach ends when the build is superseded or disposed. */
export interface Ref {
  readonly container: ProviderContainer;
  /** Read and rebuild this provider whenever the value changes. */
  watch<T>(listenable: ProviderListenable<T>): T;
  /** Read once without subscribing. */
  read<T>(listenable: ProviderListenable<T>): T;
  /** Listen without rebuilding; closed automatically on rebuild or dispose. */
  listen<T>(listenable: ProviderListenable<T>, listener: Listener<T>, opts?: ListenOptions): ProviderSubscription<T>;
  /** Run before the next rebuild and on dispose. */
  onDispose(cb: () => void): void;
  invalidateSelf(): void;
  /** Prevent auto-disposal until the returned release function is called. */
  keepAlive(): () => void;
}
