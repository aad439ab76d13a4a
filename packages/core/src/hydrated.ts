import { Bloc } from './bloc';
import type { BlocOptions } from './bloc-base';
import { Cubit } from './cubit';
import { StorageMissingError } from './errors';
import type { BlocEvent, Change } from './types';

/**
 * Key/value store for persisted states. Reads are synchronous so a bloc can
 * restore itself during construction; writes may complete later.
 */
export interface HydratedStorage {
  read(key: string): unknown;
  write(key: string, value: unknown): void | Promise<void>;
  delete(key: string): void | Promise<void>;
  clear(): void | Promise<void>;
}

let globalStorage: HydratedStorage | null = null;

/** Register the storage used by hydrated blocs that are not given one. */
export function setHydratedStorage(storage: HydratedStorage | null): void {
  globalStorage = storage;
}

export function getHydratedStorage(): HydratedStorage | null {
  return globalStorage;
}

export type HydratedOptions<S> = BlocOptions<S> & {
  storage?: HydratedStorage;
  /** Key prefix. Defaults to the class name. */
  storagePrefix?: string;
  /** Distinguishes several instances of the same class. */
  id?: string;
};

type Codec<S> = {
  fromJson(json: unknown): S | undefined;
  toJson(state: S): unknown;
};

/** Reads, writes and deletes one bloc's persisted state. Failures go to `report`. */
class Hydration<S> {
  constructor(
    private readonly storage: HydratedStorage,
    readonly key: string,
    private readonly codec: Codec<S>,
    private readonly report: (error: unknown) => void,
  ) {}

  load(): { state: S } | null {
    try {
      const json = this.storage.read(this.key);
      if (json === undefined || json === null) return null;
      const state = this.codec.fromJson(json);
      return state === undefined ? null : { state };
    } catch (e) {
      this.report(e);
      return null;
    }
  }

  save(state: S): void {
    this.settle(() => this.storage.write(this.key, this.codec.toJson(state)));
  }

  async remove(): Promise<void> {
    await this.storage.delete(this.key);
  }

  private settle(op: () => void | Promise<void>): void {
    try {
      const result = op();
      if (result instanceof Promise) void result.catch(e => this.report(e));
    } catch (e) {
      this.report(e);
    }
  }
}

function resolveStorage(owner: string, storage: HydratedStorage | undefined): HydratedStorage {
  const s = storage ?? globalStorage;
  if (!s) throw new StorageMissingError(owner);
  return s;
}

/**
 * A cubit that restores its state from storage when created and persists
 * every change.
 */
export abstract class HydratedCubit<S> extends Cubit<S> {
  private readonly hydration: Hydration<S>;

  constructor(initialState: S, opts: HydratedOptions<S> = {}) {
    super(initialState, opts);
    const storage = resolveStorage(this.name, opts.storage);
    const key = `${opts.storagePrefix ?? new.target.name}${opts.id ?? ''}`;
    this.hydration = new Hydration(storage, key, this, e => this.addError(e));
    const restored = this.hydration.load();
    if (restored) this.seed(restored.state);
    this.hydration.save(this.state);
  }

  get storageKey(): string {
    return this.hydration.key;
  }

  /** Delete the persisted state. The in-memory state is unchanged. */
  clear(): Promise<void> {
    return this.hydration.remove();
  }

  /** Decode persisted JSON. Return undefined to fall back to the initial state. */
  abstract fromJson(json: unknown): S | undefined;

  abstract toJson(state: S): unknown;

  protected override onChange(change: Change<S>): void {
    super.onChange(change);
    this.hydration.save(change.nextState);
  }
}

/** A bloc that restores its state from storage when created and persists every change. */
export abstract class HydratedBloc<E extends BlocEvent, S> extends Bloc<E, S> {
  private readonly hydration: Hydration<S>;

  constructor(initialState: S, opts: HydratedOptions<S> = {}) {
    super(initialState, opts);
    const storage = resolveStorage(this.name, opts.storage);
    const key = `${opts.storagePrefix ?? new.target.name}${opts.id ?? ''}`;
    this.hydration = new Hydration(storage, key, this, e => this.addError(e));
    const restored = this.hydration.load();
    if (restored) this.seed(restored.state);
    this.hydration.save(this.state);
  }

  get storageKey(): string {
    return this.hydration.key;
  }

  clear(): Promise<void> {
    return this.hydration.remove();
  }

  abstract fromJson(json: unknown): S | undefined;

  abstract toJson(state: S): unknown;

  protected override onChange(change: Change<S>): void {
    super.onChange(change);
    this.hydration.save(change.nextState);
  }
}
