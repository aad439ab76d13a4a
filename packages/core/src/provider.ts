import type { AsyncValue } from './async-value';
import type { ProviderContainer } from './container';
import {
  ComputedElement,
  FutureElement,
  LinkElement,
  NotifierElement,
  StateElement,
  type ProviderElement,
  type ProviderInfo,
  type ProviderKind,
  type StateController,
} from './element';
import { DisposedError } from './errors';
import type { Notifier } from './notifier';
import type { ListenOptions, ProviderListenable, ProviderSubscription, Ref } from './ref';
import { batch, considerDisposal, type ElementNode } from './scheduler';
import type { Equals, Listener } from './types';

export type ProviderOptions = {
  /** Shown by observers and in circular-dependency paths. */
  name?: string;
  /** Dispose the element once nothing listens to or depends on it. */
  autoDispose?: boolean;
};

/** Replacement of a provider's behaviour inside one container. */
export type Override = {
  readonly provider: ProviderInfo;
  /** @internal */
  install(container: ProviderContainer): void;
};

let seq = 0;

/**
 * A provider definition. Definitions hold no state: every container gets
 * its own element per definition, created on first use.
 */
export abstract class ProviderBase<T, El extends ProviderElement<T> = ProviderElement<T>>
  implements ProviderListenable<T>, ProviderInfo
{
  readonly name: string;
  readonly kind: ProviderKind;
  readonly autoDispose: boolean;
  private readonly elements = new WeakMap<ProviderContainer, El>();
  private readonly overrides = new WeakMap<ProviderContainer, (container: ProviderContainer) => El>();

  constructor(kind: ProviderKind, opts: ProviderOptions = {}) {
    this.kind = kind;
    this.name = opts.name ?? `${kind}#${++seq}`;
    this.autoDispose = opts.autoDispose ?? false;
  }

  protected abstract createElement(container: ProviderContainer): El;
  protected abstract createValueElement(container: ProviderContainer, value: T): El;

  /** Fix the value to `value` in the containers the override is installed in. */
  overrideWithValue(value: T): Override {
    return this.replaceWith(container => this.createValueElement(container, value));
  }

  protected replaceWith(factory: (container: ProviderContainer) => El): Override {
    return {
      provider: this,
      install: container => {
        this.overrides.set(container, factory);
      },
    };
  }

  /** @internal */
  isOverriddenIn(container: ProviderContainer): boolean {
    return this.overrides.has(container);
  }

  /** @internal The container owning this provider's element when used from `container`. */
  hostIn(container: ProviderContainer): ProviderContainer {
    return container.hostFor(this);
  }

  /** @internal Live element, created when missing. */
  resolve(container: ProviderContainer): El {
    const host = this.hostIn(container);
    const live = this.elements.get(host);
    if (live && !live.isDisposed) return live;
    if (host.isDisposed) throw new DisposedError('ProviderContainer');
    const factory = this.overrides.get(host);
    const element = factory ? factory(host) : this.createElement(host);
    this.elements.set(host, element);
    host.track(element);
    return element;
  }

  /** @internal Live element, if any. */
  existing(container: ProviderContainer): El | undefined {
    const element = this.elements.get(this.hostIn(container));
    return element && !element.isDisposed ? element : undefined;
  }

  /** A listenable over part of the value; dependents only rebuild when that part changes. */
  select<R>(selector: (value: T) => R, equals: Equals<R> = Object.is): ProviderListenable<R> {
    return new Selected<T, R>(this, selector, equals);
  }

  watchFrom(container: ProviderContainer, dependent: ElementNode): T {
    const element = this.resolve(container);
    // throws before linking when `dependent` is part of a cycle
    const state = element.readState();
    element.watchDependent(dependent);
    dependent.trackDependency(element);
    if (state.kind === 'error') throw state.error;
    return state.value;
  }

  readFrom(container: ProviderContainer): T {
    return batch(() => {
      const element = this.resolve(container);
      considerDisposal(element);
      return element.readValue();
    });
  }

  listenFrom(container: ProviderContainer, listener: Listener<T>, opts: ListenOptions): ProviderSubscription<T> {
    return batch(() => {
      const element = this.resolve(container);
      const remove = element.addListener((previous, next) => {
        if (next.kind === 'error') opts.onError?.(next.error);
        else listener(next.value, previous?.kind === 'value' ? previous.value : undefined);
      });
      let closed = false;
      const subscription: ProviderSubscription<T> = {
        read: () => {
          if (closed) throw new DisposedError(`${this.name} subscription`);
          return element.readValue();
        },
        close: () => {
          if (closed) return;
          closed = true;
          remove();
        },
      };
      const state = element.readState();
      if (opts.fireImmediately) {
        if (state.kind === 'error') opts.onError?.(state.error);
        else listener(state.value, undefined);
      }
      return subscription;
    });
  }
}

class Selected<S, R> implements ProviderListenable<R> {
  constructor(
    private readonly source: ProviderBase<S>,
    private readonly selector: (value: S) => R,
    private readonly equals: Equals<R>,
  ) {}

  watchFrom(container: ProviderContainer, dependent: ElementNode): R {
    const element = this.source.resolve(container);
    const state = element.readState();
    element.addDependent(dependent, {
      kind: 'select',
      changed: (previous, next) => !this.equals(this.selector(previous), this.selector(next)),
    });
    dependent.trackDependency(element);
    if (state.kind === 'error') throw state.error;
    return this.selector(state.value);
  }

  readFrom(container: ProviderContainer): R {
    return this.selector(this.source.readFrom(container));
  }

  listenFrom(container: ProviderContainer, listener: Listener<R>, opts: ListenOptions): ProviderSubscription<R> {
    return batch(() => {
      let last: { value: R } | null = null;
      const sub = this.source.listenFrom(
        container,
        value => {
          const selected = this.selector(value);
          if (last && this.equals(last.value, selected)) return;
          const previous = last?.value;
          last = { value: selected };
          listener(selected, previous);
        },
        { onError: opts.onError },
      );
      const state = this.source.resolve(container).readState();
      if (state.kind === 'value') last = { value: this.selector(state.value) };
      if (opts.fireImmediately) {
        if (last) listener(last.value, undefined);
        else if (state.kind === 'error') opts.onError?.(state.error);
      }
      return {
        read: () => this.selector(sub.read()),
        close: () => sub.close(),
      };
    });
  }
}

/** Exposes an object owned by another provider's element, such as its controller. */
class LinkProvider<C, P extends ElementNode> extends ProviderBase<C> {
  constructor(
    name: string,
    autoDispose: boolean,
    private readonly host: (container: ProviderContainer) => ProviderContainer,
    private readonly parent: (container: ProviderContainer) => P,
    private readonly pick: (parent: P) => C,
    private readonly follow = false,
  ) {
    super('link', { name, autoDispose });
  }

  override hostIn(container: ProviderContainer): ProviderContainer {
    return this.host(container);
  }

  protected createElement(container: ProviderContainer): ProviderElement<C> {
    return new LinkElement(this, container, this.parent, this.pick, this.follow);
  }

  protected createValueElement(container: ProviderContainer, value: C): ProviderElement<C> {
    return new ComputedElement(this, container, () => value);
  }
}

/** Read-only value computed from other providers. */
export class Provider<T> extends ProviderBase<T> {
  constructor(
    private readonly build: (ref: Ref) => T,
    opts?: ProviderOptions,
  ) {
    super('provider', opts);
  }

  overrideWith(build: (ref: Ref) => T): Override {
    return this.replaceWith(container => new ComputedElement(this, container, build));
  }

  protected createElement(container: ProviderContainer): ProviderElement<T> {
    return new ComputedElement(this, container, this.build);
  }

  protected createValueElement(container: ProviderContainer, value: T): ProviderElement<T> {
    return new ComputedElement(this, container, () => value);
  }
}

/** A value that can be replaced from outside through `.notifier`. */
export class StateProvider<T> extends ProviderBase<T, StateElement<T>> {
  readonly notifier: ProviderListenable<StateController<T>>;

  constructor(
    private readonly initial: (ref: Ref) => T,
    opts?: ProviderOptions,
  ) {
    super('state', opts);
    this.notifier = new LinkProvider(
      `${this.name}.notifier`,
      this.autoDispose,
      container => this.hostIn(container),
      container => this.resolve(container),
      element => element.controller,
    );
  }

  overrideWith(initial: (ref: Ref) => T): Override {
    return this.replaceWith(container => new StateElement(this, container, initial));
  }

  protected createElement(container: ProviderContainer): StateElement<T> {
    return new StateElement(this, container, this.initial);
  }

  protected createValueElement(container: ProviderContainer, value: T): StateElement<T> {
    return new StateElement(this, container, () => value);
  }
}

export class NotifierProvider<N extends Notifier<S>, S> extends ProviderBase<S, NotifierElement<N, S>> {
  /** The notifier instance; stays the same across rebuilds of the state. */
  readonly notifier: ProviderListenable<N>;

  constructor(
    private readonly factory: () => N,
    opts?: ProviderOptions,
  ) {
    super('notifier', opts);
    this.notifier = new LinkProvider(
      `${this.name}.notifier`,
      this.autoDispose,
      container => this.hostIn(container),
      container => this.resolve(container),
      element => element.notifier,
    );
  }

  overrideWith(factory: () => N): Override {
    return this.replaceWith(container => new NotifierElement(this, container, factory));
  }

  protected createElement(container: ProviderContainer): NotifierElement<N, S> {
    return new NotifierElement(this, container, this.factory);
  }

  protected createValueElement(container: ProviderContainer, value: S): NotifierElement<N, S> {
    return new NotifierElement(this, container, this.factory, { value });
  }
}

export class FutureProvider<T> extends ProviderBase<AsyncValue<T>, FutureElement<T>> {
  /** Promise of the current build; rebuilds with the provider. */
  readonly future: ProviderListenable<Promise<T>>;

  constructor(
    private readonly fetch: (ref: Ref) => Promise<T>,
    opts?: ProviderOptions,
  ) {
    super('future', opts);
    this.future = new LinkProvider(
      `${this.name}.future`,
      this.autoDispose,
      container => this.hostIn(container),
      container => this.resolve(container),
      element => element.promise,
      true,
    );
  }

  overrideWith(fetch: (ref: Ref) => Promise<T>): Override {
    return this.replaceWith(container => new FutureElement(this, container, fetch));
  }

  protected createElement(container: ProviderContainer): FutureElement<T> {
    return new FutureElement(this, container, this.fetch);
  }

  protected createValueElement(container: ProviderContainer, value: AsyncValue<T>): FutureElement<T> {
    return new FutureElement(this, container, this.fetch, { value });
  }
}

export function provider<T>(build: (ref: Ref) => T, opts?: ProviderOptions): Provider<T> {
  return new Provider(build, opts);
}

export function stateProvider<T>(initial: (ref: Ref) => T, opts?: ProviderOptions): StateProvider<T> {
  return new StateProvider(initial, opts);
}

/**
 * ```ts
 * const counterProvider = notifierProvider(() => new Counter());
 * container.read(counterProvider.notifier).increment();
 * ```
 */
export function notifierProvider<S, N extends Notifier<S>>(
  create: () => N & Notifier<S>,
  opts?: ProviderOptions,
): NotifierProvider<N, S> {
  return new NotifierProvider<N, S>(create, opts);
}

export function futureProvider<T>(fetch: (ref: Ref) => Promise<T>, opts?: ProviderOptions): FutureProvider<T> {
  return new FutureProvider(fetch, opts);
}

export function select<S, R>(
  source: ProviderBase<S>,
  selector: (value: S) => R,
  equals?: Equals<R>,
): ProviderListenable<R> {
  return source.select(selector, equals);
}

export type Family<A, P> = ((arg: A) => P) & {
  /** Forget memoised definitions; live elements stay in their containers. */
  clear(): void;
};

export type FamilyOptions<A> = {
  key?: (arg: A) => unknown;
};

function defaultKey(arg: unknown): unknown {
  return typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : arg;
}

/** One definition per argument, memoised by key. */
export function family<A, P>(create: (arg: A) => P, opts: FamilyOptions<A> = {}): Family<A, P> {
  const key = opts.key ?? defaultKey;
  const definitions = new Map<unknown, P>();
  const get = (arg: A): P => {
    const k = key(arg);
    const known = definitions.get(k);
    if (known !== undefined) return known;
    const created = create(arg);
    definitions.set(k, created);
    return created;
  };
  return Object.assign(get, { clear: () => definitions.clear() });
}
