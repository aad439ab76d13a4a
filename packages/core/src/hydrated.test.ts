import { afterEach, describe, it, expect } from 'vitest';
import { BlocBase } from './bloc-base';
import { StorageMissingError } from './errors';
import { HydratedBloc, HydratedCubit, setHydratedStorage, type HydratedOptions, type HydratedStorage } from './hydrated';
import { BlocObserver } from './observer';
import { InMemoryStorage } from './storage';
import type { Change } from './types';

type Settings = { theme: string };

class SettingsCubit extends HydratedCubit<Settings> {
  constructor(opts?: HydratedOptions<Settings>) {
    super({ theme: 'light' }, opts);
  }

  setTheme(theme: string): void {
    this.emit({ theme });
  }

  fromJson(json: unknown): Settings | undefined {
    if (typeof json === 'object' && json !== null && 'theme' in json && typeof json.theme === 'string') {
      return { theme: json.theme };
    }
    return undefined;
  }

  toJson(state: Settings): unknown {
    return state;
  }
}

class ErrorLog extends BlocObserver {
  readonly errors: string[] = [];

  override onError<S>(_bloc: BlocBase<S>, error: unknown): void {
    this.errors.push(error instanceof Error ? error.message : String(error));
  }
}

const initialObserver = BlocBase.observer;

afterEach(() => {
  setHydratedStorage(null);
  BlocBase.observer = initialObserver;
});

describe('HydratedCubit', () => {
  it('writes the initial state on creation and every change after', () => {
    const storage = new InMemoryStorage();
    const cubit = new SettingsCubit({ storage });
    expect(storage.read('SettingsCubit')).toEqual({ theme: 'light' });

    cubit.setTheme('dark');
    expect(storage.read('SettingsCubit')).toEqual({ theme: 'dark' });
  });

  it('restores the stored state', () => {
    const storage = new InMemoryStorage();
    storage.write('SettingsCubit', { theme: 'dark' });
    const cubit = new SettingsCubit({ storage });
    expect(cubit.state).toEqual({ theme: 'dark' });
  });

  it('reports the restored state to the observer as a change', () => {
    const changes: string[] = [];
    class Changes extends BlocObserver {
      override onChange<S>(_bloc: BlocBase<S>, change: Change<S>): void {
        changes.push(`${JSON.stringify(change.currentState)}->${JSON.stringify(change.nextState)}`);
      }
    }
    BlocBase.observer = new Changes();
    const storage = new InMemoryStorage();
    storage.write('SettingsCubit', { theme: 'dark' });
    new SettingsCubit({ storage });
    new SettingsCubit({ storage: new InMemoryStorage() });

    expect(changes).toEqual(['{"theme":"light"}->{"theme":"dark"}']);
  });

  it('falls back to the initial state when the stored value does not decode', () => {
    const storage = new InMemoryStorage();
    storage.write('SettingsCubit', { colour: 'red' });
    const cubit = new SettingsCubit({ storage });
    expect(cubit.state).toEqual({ theme: 'light' });
    expect(storage.read('SettingsCubit')).toEqual({ theme: 'light' });
  });

  it('reports read failures and keeps the initial state', () => {
    const observer = new ErrorLog();
    BlocBase.observer = observer;
    const storage: HydratedStorage = {
      read: () => {
        throw new Error('disk unreadable');
      },
      write: () => {},
      delete: () => {},
      clear: () => {},
    };
    const cubit = new SettingsCubit({ storage });
    expect(cubit.state).toEqual({ theme: 'light' });
    expect(observer.errors).toEqual(['disk unreadable']);
  });

  it('reports asynchronous write failures', async () => {
    const observer = new ErrorLog();
    BlocBase.observer = observer;
    const storage: HydratedStorage = {
      read: () => undefined,
      write: () => Promise.reject(new Error('disk full')),
      delete: () => {},
      clear: () => {},
    };
    new SettingsCubit({ storage });
    await new Promise(resolve => setTimeout(resolve, 0));
    expect(observer.errors).toEqual(['disk full']);
  });

  it('builds the key from storagePrefix and id', () => {
    const storage = new InMemoryStorage();
    const a = new SettingsCubit({ storage, storagePrefix: 'settings:', id: 'a' });
    const b = new SettingsCubit({ storage, storagePrefix: 'settings:', id: 'b' });
    a.setTheme('dark');

    expect(a.storageKey).toBe('settings:a');
    expect(storage.read('settings:a')).toEqual({ theme: 'dark' });
    expect(storage.read('settings:b')).toEqual({ theme: 'light' });
    expect(b.state).toEqual({ theme: 'light' });
  });

  it('uses the global storage when none is passed', () => {
    expect(() => new SettingsCubit()).toThrow(StorageMissingError);

    const storage = new InMemoryStorage();
    setHydratedStorage(storage);
    new SettingsCubit().setTheme('dark');
    expect(storage.keys()).toEqual(['SettingsCubit']);
  });

  it('clear deletes the stored state', async () => {
    const storage = new InMemoryStorage();
    const cubit = new SettingsCubit({ storage });
    await cubit.clear();
    expect(storage.read('SettingsCubit')).toBeUndefined();
    expect(cubit.state).toEqual({ theme: 'light' });
  });
});

describe('HydratedBloc', () => {
  type CartEvent = { type: 'add'; item: string };

  class CartBloc extends HydratedBloc<CartEvent, string[]> {
    constructor(storage: HydratedStorage) {
      super([], { storage });
      this.on('add', (event, emit) => emit([...this.state, event.item]));
    }

    fromJson(json: unknown): string[] | undefined {
      if (!Array.isArray(json)) return undefined;
      const items = json.filter((x): x is string => typeof x === 'string');
      return items.length === json.length ? items : undefined;
    }

    toJson(state: string[]): unknown {
      return state;
    }
  }

  it('persists states produced by handlers and restores them', async () => {
    const storage = new InMemoryStorage();
    const first = new CartBloc(storage);
    first.add({ type: 'add', item: 'apple' });
    first.add({ type: 'add', item: 'pear' });
    await first.idle();
    await first.close();

    const second = new CartBloc(storage);
    expect(second.state).toEqual(['apple', 'pear']);
  });
});
