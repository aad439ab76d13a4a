import type { ProviderInfo } from './element';
import { DisposedError, ListenerError } from './errors';
import type { Override, ProviderBase } from './provider';
import type { ListenOptions, ProviderListenable, ProviderSubscription } from './ref';
import { batch, type ElementNode } from './scheduler';
import type { Listener } from './types';

/** Lifecycle hooks for every element of a container and its children. */
export class ProviderObserver {
  didAddProvider(_provider: ProviderInfo, _value: unknown, _container: ProviderContainer): void {}
  didUpdateProvider(
    _provider: ProviderInfo,
    _previous: unknown,
    _next: unknown,
    _container: ProviderContainer,
  ): void {}
  didDisposeProvider(_provider: ProviderInfo, _container: ProviderContainer): void {}
  providerDidFail(_provider: ProviderInfo, _error: unknown, _container: ProviderContainer): void {}
}

export type ProviderContainerOptions = {
  overrides?: readonly Override[];
  observers?: readonly ProviderObserver[];
  /** Non-overridden providers resolve to the parent's elements. */
  parent?: ProviderContainer;
};

type Hook = (observer: ProviderObserver) => void;

export class ProviderContainer {
  readonly parent: ProviderContainer | null;
  private readonly overridden = new Set<ProviderInfo>();
  private readonly observers: readonly ProviderObserver[];
  private readonly elements = new Set<ElementNode>();
  private readonly subscriptions = new Set<ProviderSubscription<unknown>>();
  private readonly children = new Set<ProviderContainer>();
  private disposed = false;

  constructor(opts: ProviderContainerOptions = {}) {
    this.parent = opts.parent ?? null;
    if (this.parent) {
      if (this.parent.isDisposed) throw new DisposedError('ProviderContainer');
      this.parent.children.add(this);
    }
    this.observers = opts.observers ?? [];
    for (const override of opts.overrides ?? []) {
      override.install(this);
      this.overridden.add(override.provider);
    }
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  read<T>(listenable: ProviderListenable<T>): T {
    this.assertAlive();
    return listenable.readFrom(this);
  }

  listen<T>(listenable: ProviderListenable<T>, listener: Listener<T>, opts: ListenOptions = {}): ProviderSubscription<T> {
    this.assertAlive();
    const sub = listenable.listenFrom(this, listener, opts);
    const tracked: ProviderSubscription<T> = {
      read: () => sub.read(),
      close: () => {
        this.subscriptions.delete(tracked);
        sub.close();
      },
    };
    this.subscriptions.add(tracked);
    return tracked;
  }

  /** Mark the provider's element dirty; it rebuilds on next read, or now if listened to. */
  invalidate<T>(provider: ProviderBase<T>): void {
    this.assertAlive();
    batch(() => provider.existing(this)?.markDirty());
  }

  /** Invalidate and read the fresh value. */
  refresh<T>(provider: ProviderBase<T>): T {
    this.assertAlive();
    return batch(() => {
      provider.existing(this)?.markDirty();
      return provider.readFrom(this);
    });
  }

  /** Whether the provider currently has a live element visible from this container. */
  exists<T>(provider: ProviderBase<T>): boolean {
    return provider.existing(this) !== undefined;
  }

  /** Disposes children, closes subscriptions, then disposes every element this container owns. */
  dispose(): void {
    if (this.disposed) return;
    for (const child of Array.from(this.children)) child.dispose();
    this.disposed = true;
    batch(() => {
      for (const sub of Array.from(this.subscriptions)) sub.close();
      for (const element of Array.from(this.elements)) element.dispose();
    });
    this.parent?.children.delete(this);
  }

  /** @internal */
  hostFor(provider: ProviderInfo): ProviderContainer {
    if (this.overridden.has(provider) || !this.parent) return this;
    return this.parent.hostFor(provider);
  }

  /** @internal */
  track(element: ElementNode): void {
    this.elements.add(element);
  }

  /** @internal */
  untrack(element: ElementNode): void {
    this.elements.delete(element);
  }

  /** @internal */
  reportAdd(provider: ProviderInfo, value: unknown): void {
    this.report(o => o.didAddProvider(provider, value, this));
  }

  /** @internal */
  reportUpdate(provider: ProviderInfo, previous: unknown, next: unknown): void {
    this.report(o => o.didUpdateProvider(provider, previous, next, this));
  }

  /** @internal */
  reportDispose(provider: ProviderInfo): void {
    this.report(o => o.didDisposeProvider(provider, this));
  }

  /** @internal */
  reportFailure(provider: ProviderInfo, error: unknown): void {
    this.report(o => o.providerDidFail(provider, error, this));
  }

  // Parents observe their children's elements as well.
  private report(hook: Hook): void {
    const errors: unknown[] = [];
    for (let c: ProviderContainer | null = this; c; c = c.parent) {
      for (const observer of c.observers) {
        try {
          hook(observer);
        } catch (e) {
          errors.push(e);
        }
      }
    }
    if (errors.length) throw new ListenerError(errors);
  }

  private assertAlive(): void {
    if (this.disposed) throw new DisposedError('ProviderContainer');
  }
}
