import { AsyncValue } from './async-value';
import type { ProviderContainer } from './container';
import { CircularDependencyError, DisposedError, ListenerError } from './errors';
import type { Notifier } from './notifier';
import type { ListenOptions, ProviderListenable, ProviderSubscription, Ref } from './ref';
import {
  batch,
  buildPath,
  considerDisposal,
  enterBuild,
  exitBuild,
  schedule,
  type ElementNode,
} from './scheduler';
import type { Listener } from './types';

export type ProviderKind = 'provider' | 'state' | 'notifier' | 'future' | 'link';

export type ProviderInfo = {
  readonly name: string;
  /** `link` marks the `.notifier` / `.future` views of another provider. */
  readonly kind: ProviderKind;
  readonly autoDispose: boolean;
};

export type ElementState<T> = { kind: 'value'; value: T } | { kind: 'error'; error: unknown };

/** How a dependent reacts to changes of the element it depends on. */
export type Trigger<T> =
  | { kind: 'watch' }
  | { kind: 'mount' }
  | { kind: 'select'; changed: (previous: T, next: T) => boolean };

export type StateListener<T> = (previous: ElementState<T> | null, next: ElementState<T>) => void;

function unchanged<T>(a: ElementState<T>, b: ElementState<T>): boolean {
  if (a.kind === 'value' && b.kind === 'value') return Object.is(a.value, b.value);
  if (a.kind === 'error' && b.kind === 'error') return a.error === b.error;
  return false;
}

function fires<T>(trigger: Trigger<T>, previous: ElementState<T>, next: ElementState<T>): boolean {
  switch (trigger.kind) {
    case 'watch':
      return true;
    case 'mount':
      return false;
    case 'select':
      if (previous.kind !== 'value' || next.kind !== 'value') return true;
      try {
        return trigger.changed(previous.value, next.value);
      } catch {
        // a selector that throws is re-run by the rebuild, which records the error
        return true;
      }
  }
}

/**
 * The live instance of one provider inside one container: its current
 * state, its dependencies and dependents, listeners and disposal hooks.
 */
export abstract class ProviderElement<T> implements ElementNode {
  private current: ElementState<T> | null = null;
  private dirty = true;
  private building = false;
  private disposed = false;
  private level = 0;
  private readonly listeners = new Set<StateListener<T>>();
  private readonly dependents = new Map<ElementNode, Trigger<T>[]>();
  private readonly dependencies = new Set<ElementNode>();
  private readonly keepAlives = new Set<symbol>();
  private disposers: Array<() => void> = [];
  protected readonly ref: Ref;

  constructor(
    readonly provider: ProviderInfo,
    readonly container: ProviderContainer,
  ) {
    this.ref = new ElementRef(this);
  }

  get label(): string {
    return this.provider.name;
  }

  get depth(): number {
    return this.level;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  /** The committed state, without building. */
  protected get snapshot(): ElementState<T> | null {
    return this.current;
  }

  protected abstract create(ref: Ref): T;

  /** Current state, building first when needed. Build errors are returned, not thrown. */
  readState(): ElementState<T> {
    if (this.disposed) throw new DisposedError(this.label);
    if (this.building) throw new CircularDependencyError(buildPath(this));
    if (this.dirty || !this.current) return this.rebuild();
    return this.current;
  }

  readValue(): T {
    const state = this.readState();
    if (state.kind === 'error') throw state.error;
    return state.value;
  }

  /** Replace the value from outside a build, as a state setter does. */
  setValue(value: T): void {
    if (this.disposed) throw new DisposedError(this.label);
    batch(() => {
      // a pending build would overwrite the write
      if (!this.building && (this.dirty || !this.current)) this.rebuild();
      this.commit({ kind: 'value', value });
    });
  }

  addListener(listener: StateListener<T>): () => void {
    const entry: StateListener<T> = (previous, next) => listener(previous, next);
    this.listeners.add(entry);
    return () => {
      if (this.listeners.delete(entry)) considerDisposal(this);
    };
  }

  addDependent(node: ElementNode, trigger: Trigger<T>): void {
    const triggers = this.dependents.get(node);
    if (triggers) triggers.push(trigger);
    else this.dependents.set(node, [trigger]);
  }

  mountDependent(node: ElementNode): void {
    this.addDependent(node, { kind: 'mount' });
  }

  watchDependent(node: ElementNode): void {
    this.addDependent(node, { kind: 'watch' });
  }

  removeDependent(node: ElementNode): void {
    if (this.dependents.delete(node)) considerDisposal(this);
  }

  trackDependency(node: ElementNode): void {
    this.dependencies.add(node);
  }

  keepAlive(): () => void {
    const link = Symbol(this.label);
    this.keepAlives.add(link);
    return () => {
      if (this.keepAlives.delete(link)) considerDisposal(this);
    };
  }

  onDispose(cb: () => void): void {
    this.disposers.push(cb);
  }

  isInUse(): boolean {
    return this.listeners.size > 0 || this.dependents.size > 0;
  }

  canAutoDispose(): boolean {
    return (
      this.provider.autoDispose &&
      !this.disposed &&
      this.listeners.size === 0 &&
      this.dependents.size === 0 &&
      this.keepAlives.size === 0
    );
  }

  flush(): void {
    if (this.dirty && !this.disposed) this.rebuild();
  }

  markDirty(): void {
    if (this.disposed) return;
    this.dirty = true;
    schedule(this);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.runDisposers();
    this.detachDependencies();
    this.listeners.clear();
    this.keepAlives.clear();
    const dependents = Array.from(this.dependents.keys());
    this.dependents.clear();
    // they read through a fresh element on their next build
    for (const node of dependents) node.markDirty();
    this.container.untrack(this);
    this.container.reportDispose(this.provider);
  }

  private rebuild(): ElementState<T> {
    this.runDisposers();
    this.detachDependencies();
    this.dirty = false;
    this.building = true;
    enterBuild(this);
    let next: ElementState<T>;
    try {
      next = { kind: 'value', value: this.create(this.ref) };
    } catch (error) {
      next = { kind: 'error', error };
    } finally {
      this.building = false;
      exitBuild(this);
    }
    let level = 0;
    for (const dep of this.dependencies) level = Math.max(level, dep.depth + 1);
    this.level = level;
    this.commit(next);
    return next;
  }

  private commit(next: ElementState<T>): void {
    const previous = this.current;
    this.current = next;
    if (!previous) {
      if (next.kind === 'error') this.container.reportFailure(this.provider, next.error);
      else this.container.reportAdd(this.provider, next.value);
      return;
    }
    if (unchanged(previous, next)) return;
    const errors: unknown[] = [];
    try {
      if (next.kind === 'error') this.container.reportFailure(this.provider, next.error);
      else this.container.reportUpdate(this.provider, previous.kind === 'value' ? previous.value : undefined, next.value);
    } catch (e) {
      if (e instanceof ListenerError) errors.push(...e.errors);
      else errors.push(e);
    }
    for (const [node, triggers] of this.dependents) {
      if (triggers.some(t => fires(t, previous, next))) node.markDirty();
    }
    this.notify(previous, next, errors);
  }

  private notify(previous: ElementState<T>, next: ElementState<T>, errors: unknown[]): void {
    const snapshot = Array.from(this.listeners);
    for (const fn of snapshot) {
      if (!this.listeners.has(fn)) continue;
      try {
        fn(previous, next);
      } catch (e) {
        errors.push(e);
      }
    }
    if (errors.length) throw new ListenerError(errors);
  }

  private runDisposers(): void {
    const disposers = this.disposers;
    this.disposers = [];
    this.keepAlives.clear();
    for (const cb of disposers) cb();
  }

  private detachDependencies(): void {
    const deps = Array.from(this.dependencies);
    this.dependencies.clear();
    for (const dep of deps) dep.removeDependent(this);
  }
}

/** What a ref needs from its element, independent of the value type. */
interface RefHost extends ElementNode {
  readonly container: ProviderContainer;
  onDispose(cb: () => void): void;
  keepAlive(): () => void;
}

class ElementRef implements Ref {
  constructor(private readonly element: RefHost) {}

  get container(): ProviderContainer {
    return this.element.container;
  }

  watch<T>(listenable: ProviderListenable<T>): T {
    this.assertAlive();
    return listenable.watchFrom(this.element.container, this.element);
  }

  read<T>(listenable: ProviderListenable<T>): T {
    this.assertAlive();
    return listenable.readFrom(this.element.container);
  }

  listen<T>(listenable: ProviderListenable<T>, listener: Listener<T>, opts: ListenOptions = {}): ProviderSubscription<T> {
    this.assertAlive();
    const sub = listenable.listenFrom(this.element.container, listener, opts);
    this.element.onDispose(() => sub.close());
    return sub;
  }

  onDispose(cb: () => void): void {
    this.element.onDispose(cb);
  }

  invalidateSelf(): void {
    batch(() => this.element.markDirty());
  }

  keepAlive(): () => void {
    return this.element.keepAlive();
  }

  private assertAlive(): void {
    if (this.element.isDisposed) throw new DisposedError(this.element.label);
  }
}

/** Element of a provider defined by a build function. */
export class ComputedElement<T> extends ProviderElement<T> {
  constructor(
    provider: ProviderInfo,
    container: ProviderContainer,
    private readonly build: (ref: Ref) => T,
  ) {
    super(provider, container);
  }

  protected create(ref: Ref): T {
    return this.build(ref);
  }
}

/** Read/write access to a state provider's value. */
export class StateController<T> {
  constructor(private readonly element: ProviderElement<T>) {}

  get state(): T {
    return this.element.readValue();
  }

  set state(value: T) {
    this.element.setValue(value);
  }

  update(fn: (state: T) => T): T {
    const next = fn(this.state);
    this.state = next;
    return next;
  }
}

export class StateElement<T> extends ProviderElement<T> {
  readonly controller: StateController<T>;

  constructor(
    provider: ProviderInfo,
    container: ProviderContainer,
    private readonly initial: (ref: Ref) => T,
  ) {
    super(provider, container);
    this.controller = new StateController(this);
  }

  protected create(ref: Ref): T {
    return this.initial(ref);
  }
}

/** Owns one notifier instance across rebuilds; each build re-runs `notifier.build()`. */
export class NotifierElement<N extends Notifier<S>, S> extends ProviderElement<S> {
  readonly notifier: N;

  constructor(
    provider: ProviderInfo,
    container: ProviderContainer,
    factory: () => N,
    private readonly fixed: { value: S } | null = null,
  ) {
    super(provider, container);
    this.notifier = factory();
    this.notifier.attach({
      ref: this.ref,
      read: () => this.readValue(),
      write: value => this.setValue(value),
    });
  }

  protected create(): S {
    return this.fixed ? this.fixed.value : this.notifier.build();
  }
}

function promiseOf<T>(value: AsyncValue<T>): Promise<T> {
  switch (value.status) {
    case 'data':
      return Promise.resolve(value.value);
    case 'error':
      return Promise.reject(value.error);
    case 'loading':
      // never settles: an overridden loading state stays loading
      return new Promise<T>(() => {});
  }
}

/**
 * Element of a future provider. Each build starts a fetch and reports
 * `loading` (carrying the last data); only the latest fetch may settle it.
 */
export class FutureElement<T> extends ProviderElement<AsyncValue<T>> {
  private generation = 0;
  private latest: Promise<T> | null = null;

  constructor(
    provider: ProviderInfo,
    container: ProviderContainer,
    private readonly fetch: (ref: Ref) => Promise<T>,
    private readonly fixed: { value: AsyncValue<T> } | null = null,
  ) {
    super(provider, container);
  }

  /** The promise of the current build. */
  get promise(): Promise<T> {
    this.readState();
    return this.latest ?? Promise.reject(new DisposedError(this.label));
  }

  protected create(ref: Ref): AsyncValue<T> {
    const generation = ++this.generation;
    if (this.fixed) {
      this.track(generation, promiseOf(this.fixed.value));
      return this.fixed.value;
    }
    const last = this.snapshot;
    const previous = last?.kind === 'value' ? AsyncValue.lastValue(last.value) : undefined;
    let promise: Promise<T>;
    try {
      promise = Promise.resolve(this.fetch(ref));
    } catch (e) {
      promise = Promise.reject(e);
    }
    this.track(generation, promise, previous);
    return AsyncValue.loading(previous);
  }

  private track(generation: number, promise: Promise<T>, previous?: { value: T }): void {
    this.latest = promise;
    void promise.then(
      value => this.settle(generation, AsyncValue.data(value)),
      error => this.settle(generation, AsyncValue.error(error, previous)),
    );
  }

  private settle(generation: number, value: AsyncValue<T>): void {
    if (generation !== this.generation || this.isDisposed || this.isDirty) return;
    if (this.fixed) return;
    this.setValue(value);
  }
}

/**
 * Element exposing an object owned by another element (a controller, a
 * notifier, a promise). Keeps that element alive; rebuilds on its changes
 * only when `follow` is set.
 */
export class LinkElement<C, P extends ElementNode> extends ProviderElement<C> {
  constructor(
    provider: ProviderInfo,
    container: ProviderContainer,
    private readonly parent: (container: ProviderContainer) => P,
    private readonly pick: (parent: P) => C,
    private readonly follow = false,
  ) {
    super(provider, container);
  }

  protected create(): C {
    const parent = this.parent(this.container);
    if (this.follow) parent.watchDependent(this);
    else parent.mountDependent(this);
    this.trackDependency(parent);
    return this.pick(parent);
  }
}
