import { describe, it, expect, vi } from 'vitest';
import type { AsyncValue } from './async-value';
import { ProviderContainer, ProviderObserver } from './container';
import type { ProviderInfo } from './element';
import { CircularDependencyError, DisposedError, ListenerError } from './errors';
import { Notifier } from './notifier';
import { family, futureProvider, notifierProvider, provider, select, stateProvider, type Provider } from './provider';

describe('provider', () => {
  it('recomputes derived values after the source changes', () => {
    const count = stateProvider(() => 1);
    const doubled = provider(ref => ref.watch(count) * 2);
    const c = new ProviderContainer();

    expect(c.read(doubled)).toBe(2);
    c.read(count.notifier).state = 5;
    expect(c.read(doubled)).toBe(10);
  });

  it('notifies listeners with next and previous values', () => {
    const count = stateProvider(() => 1);
    const doubled = provider(ref => ref.watch(count) * 2);
    const c = new ProviderContainer();
    const calls: Array<[number, number | undefined]> = [];
    c.listen(doubled, (next, prev) => calls.push([next, prev]));

    const ctrl = c.read(count.notifier);
    ctrl.state = 2;
    ctrl.update(n => n + 1);
    ctrl.state = 3;

    expect(calls).toEqual([
      [4, 2],
      [6, 4],
    ]);
  });

  it('fires immediately when asked', () => {
    const name = provider(() => 'ada');
    const c = new ProviderContainer();
    const listener = vi.fn();
    c.listen(name, listener, { fireImmediately: true });
    expect(listener).toHaveBeenCalledWith('ada', undefined);
  });

  it('rebuilds listened providers eagerly but does not notify for identical values', () => {
    const count = stateProvider(() => 1);
    let builds = 0;
    const isEven = provider(ref => {
      builds++;
      return ref.watch(count) % 2 === 0;
    });
    const c = new ProviderContainer();
    const listener = vi.fn();
    c.listen(isEven, listener);

    c.read(count.notifier).state = 3;
    expect(builds).toBe(2);
    expect(listener).not.toHaveBeenCalled();

    c.read(count.notifier).state = 4;
    expect(listener).toHaveBeenCalledWith(true, false);
  });

  it('builds lazily: unobserved dirty providers wait for the next read', () => {
    const count = stateProvider(() => 0);
    let builds = 0;
    const derived = provider(ref => {
      builds++;
      return ref.watch(count);
    });
    const c = new ProviderContainer();
    c.read(derived);
    c.read(count.notifier).state = 1;
    c.read(count.notifier).state = 2;
    expect(builds).toBe(1);
    expect(c.read(derived)).toBe(2);
    expect(builds).toBe(2);
  });

  it('runs onDispose callbacks before each rebuild and on dispose', () => {
    const count = stateProvider(() => 0);
    const events: string[] = [];
    const tracker = provider(ref => {
      const n = ref.watch(count);
      ref.onDispose(() => events.push(`dispose ${n}`));
      events.push(`build ${n}`);
      return n;
    });
    const c = new ProviderContainer();
    c.listen(tracker, () => {});

    c.read(count.notifier).state = 1;
    c.dispose();

    expect(events).toEqual(['build 0', 'dispose 0', 'build 1', 'dispose 1']);
  });

  it('exists, invalidate and refresh', () => {
    let n = 0;
    const counter = provider(() => ++n);
    const c = new ProviderContainer();

    expect(c.exists(counter)).toBe(false);
    expect(c.read(counter)).toBe(1);
    expect(c.exists(counter)).toBe(true);
    expect(c.read(counter)).toBe(1);
    expect(c.refresh(counter)).toBe(2);
    c.invalidate(counter);
    expect(c.read(counter)).toBe(3);
  });

  it('rejects use after the container is disposed', () => {
    const p = provider(() => 1);
    const c = new ProviderContainer();
    c.dispose();
    expect(() => c.read(p)).toThrow(DisposedError);
  });
});

describe('writes before the first read', () => {
  it('keeps a state written through the controller', () => {
    const count = stateProvider(() => 0);
    const doubled = provider(ref => ref.watch(count) * 2);
    const c = new ProviderContainer();
    c.read(count.notifier).state = 5;
    expect(c.read(count)).toBe(5);
    expect(c.read(doubled)).toBe(10);
  });

  it('updates from the built value', () => {
    const count = stateProvider(() => 3);
    const c = new ProviderContainer();
    expect(c.read(count.notifier).update(n => n + 1)).toBe(4);
    expect(c.read(count)).toBe(4);
  });

  it('keeps a notifier state assigned before the first read', () => {
    class Named extends Notifier<string> {
      build(): string {
        return 'initial';
      }

      rename(name: string): void {
        this.state = name;
      }
    }
    const named = notifierProvider(() => new Named());
    const c = new ProviderContainer();
    c.read(named.notifier).rename('renamed');
    expect(c.read(named)).toBe('renamed');
  });
});

describe('select', () => {
  type User = { name: string; age: number };

  it('rebuilds dependents only when the selected part changes', () => {
    const user = stateProvider<User>(() => ({ name: 'a', age: 1 }));
    let builds = 0;
    const nameLength = provider(ref => {
      builds++;
      return ref.watch(user.select(u => u.name)).length;
    });
    const c = new ProviderContainer();
    c.listen(nameLength, () => {});
    const ctrl = c.read(user.notifier);

    ctrl.state = { name: 'a', age: 2 };
    expect(builds).toBe(1);

    ctrl.state = { name: 'bb', age: 2 };
    expect(builds).toBe(2);
    expect(c.read(nameLength)).toBe(2);
  });

  it('listens to the selected part only', () => {
    const user = stateProvider<User>(() => ({ name: 'a', age: 1 }));
    const c = new ProviderContainer();
    const listener = vi.fn();
    c.listen(select(user, u => u.age), listener);
    const ctrl = c.read(user.notifier);

    ctrl.state = { name: 'x', age: 1 };
    ctrl.state = { name: 'x', age: 5 };

    expect(listener.mock.calls).toEqual([[5, 1]]);
    expect(c.read(select(user, u => u.age))).toBe(5);
  });
});

describe('notifierProvider', () => {
  class Counter extends Notifier<number> {
    build(): number {
      return 0;
    }

    increment(): void {
      this.state = this.state + 1;
    }
  }

  it('exposes the notifier and its state', () => {
    const counter = notifierProvider(() => new Counter());
    const c = new ProviderContainer();
    const listener = vi.fn();
    c.listen(counter, listener);

    c.read(counter.notifier).increment();
    c.read(counter.notifier).increment();

    expect(c.read(counter)).toBe(2);
    expect(c.read(counter.notifier)).toBe(c.read(counter.notifier));
    expect(listener.mock.calls).toEqual([
      [1, 0],
      [2, 1],
    ]);
  });

  it('keeps the same notifier across rebuilds', () => {
    const factor = stateProvider(() => 1);
    class Scaled extends Notifier<number> {
      build(): number {
        return this.ref.watch(factor) * 10;
      }

      bump(): void {
        this.state = this.state + 1;
      }
    }
    const scaled = notifierProvider(() => new Scaled());
    const c = new ProviderContainer();
    const instance = c.read(scaled.notifier);
    instance.bump();
    expect(c.read(scaled)).toBe(11);

    c.read(factor.notifier).state = 2;
    expect(c.read(scaled)).toBe(20);
    expect(c.read(scaled.notifier)).toBe(instance);
  });

  it('can be overridden with another notifier or a fixed value', () => {
    class StartsAtTen extends Counter {
      override build(): number {
        return 10;
      }
    }
    const counter = notifierProvider(() => new Counter());
    const replaced = new ProviderContainer({ overrides: [counter.overrideWith(() => new StartsAtTen())] });
    replaced.read(counter.notifier).increment();
    expect(replaced.read(counter)).toBe(11);

    const fixed = new ProviderContainer({ overrides: [counter.overrideWithValue(42)] });
    expect(fixed.read(counter)).toBe(42);
  });
});

describe('futureProvider', () => {
  it('goes from loading to data', async () => {
    const repo = provider(() => ({ load: async () => 42 }));
    const answer = futureProvider(ref => ref.watch(repo).load());
    const c = new ProviderContainer();
    const seen: string[] = [];
    c.listen(answer, v => seen.push(v.status), { fireImmediately: true });

    await expect(c.read(answer.future)).resolves.toBe(42);
    expect(c.read(answer)).toEqual({ status: 'data', value: 42 });
    expect(seen).toEqual(['loading', 'data']);
  });

  it('keeps the previous value while refreshing and on error', async () => {
    let attempt = 0;
    const flaky = futureProvider(async () => {
      attempt++;
      if (attempt === 2) throw new Error('offline');
      return attempt;
    });
    const c = new ProviderContainer();
    const seen: AsyncValue<number>[] = [];
    c.listen(flaky, v => seen.push(v));

    await c.read(flaky.future);
    expect(c.refresh(flaky)).toEqual({ status: 'loading', previous: { value: 1 } });
    await expect(c.read(flaky.future)).rejects.toThrow('offline');

    const last = c.read(flaky);
    expect(last.status).toBe('error');
    expect(last.status === 'error' && last.previous).toEqual({ value: 1 });
    expect(seen.map(v => v.status)).toEqual(['data', 'loading', 'error']);
  });

  it('only lets the latest build settle the value', async () => {
    const resolvers: Array<(n: number) => void> = [];
    const slow = futureProvider(() => new Promise<number>(resolve => resolvers.push(resolve)));
    const c = new ProviderContainer();
    c.listen(slow, () => {});

    c.invalidate(slow);
    expect(resolvers).toHaveLength(2);
    resolvers[1](2);
    resolvers[0](1);

    await expect(c.read(slow.future)).resolves.toBe(2);
    expect(c.read(slow)).toEqual({ status: 'data', value: 2 });
  });

  it('can be overridden with a fixed AsyncValue', async () => {
    const remote = futureProvider(async () => 'remote');
    const c = new ProviderContainer({ overrides: [remote.overrideWithValue({ status: 'data', value: 'local' })] });
    expect(c.read(remote)).toEqual({ status: 'data', value: 'local' });
    await expect(c.read(remote.future)).resolves.toBe('local');
  });
});

describe('family', () => {
  it('memoises one definition per argument', () => {
    const todo = family((id: number) => provider(() => ({ id, title: `todo ${id}` }), { name: `todo(${id})` }));
    const c = new ProviderContainer();

    expect(todo(1)).toBe(todo(1));
    expect(todo(1)).not.toBe(todo(2));
    expect(todo(2).name).toBe('todo(2)');
    expect(c.read(todo(2)).title).toBe('todo 2');
  });

  it('keys object arguments by their JSON form, or by a custom key', () => {
    const page = family((q: { page: number }) => provider(() => q.page));
    expect(page({ page: 1 })).toBe(page({ page: 1 }));

    const byId = family((q: { id: string; label: string }) => provider(() => q.label), { key: q => q.id });
    expect(byId({ id: 'a', label: 'x' })).toBe(byId({ id: 'a', label: 'y' }));

    byId.clear();
    expect(new ProviderContainer().read(byId({ id: 'a', label: 'y' }))).toBe('y');
  });
});

describe('autoDispose', () => {
  it('disposes after a plain read', () => {
    let disposed = 0;
    const temp = provider(
      ref => {
        ref.onDispose(() => disposed++);
        return 'x';
      },
      { autoDispose: true },
    );
    const c = new ProviderContainer();

    expect(c.read(temp)).toBe('x');
    expect(c.exists(temp)).toBe(false);
    expect(disposed).toBe(1);
  });

  it('stays alive while listened to', () => {
    let disposed = 0;
    const temp = provider(
      ref => {
        ref.onDispose(() => disposed++);
        return 'x';
      },
      { autoDispose: true },
    );
    const c = new ProviderContainer();

    const sub = c.listen(temp, () => {});
    expect(c.exists(temp)).toBe(true);
    expect(sub.read()).toBe('x');

    sub.close();
    expect(c.exists(temp)).toBe(false);
    expect(disposed).toBe(1);
    expect(() => sub.read()).toThrow(DisposedError);
  });

  it('cascades to dependencies nothing else uses', () => {
    const dep = provider(() => 1, { autoDispose: true });
    const top = provider(ref => ref.watch(dep) + 1, { autoDispose: true });
    const c = new ProviderContainer();

    const sub = c.listen(top, () => {});
    expect(c.exists(dep)).toBe(true);
    sub.close();
    expect(c.exists(top)).toBe(false);
    expect(c.exists(dep)).toBe(false);
  });

  it('keepAlive holds the element until released', () => {
    let release: () => void = () => {};
    const cached = provider(
      ref => {
        release = ref.keepAlive();
        return 'cached';
      },
      { autoDispose: true },
    );
    const c = new ProviderContainer();

    c.read(cached);
    expect(c.exists(cached)).toBe(true);
    release();
    expect(c.exists(cached)).toBe(false);
  });
});

describe('errors', () => {
  it('reports circular dependencies with their path', () => {
    const a: Provider<number> = provider(ref => ref.watch(b) + 1, { name: 'a' });
    const b: Provider<number> = provider(ref => ref.watch(a) + 1, { name: 'b' });
    const c = new ProviderContainer();

    expect(() => c.read(a)).toThrow('Circular provider dependency: a -> b -> a');
    expect(() => c.read(a)).toThrow(CircularDependencyError);
  });

  it('stores build errors and hands them to onError', () => {
    const failing = provider((): number => {
      throw new Error('cannot build');
    });
    const c = new ProviderContainer();
    const listener = vi.fn();
    const onError = vi.fn();

    c.listen(failing, listener, { fireImmediately: true, onError });
    expect(listener).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledTimes(1);
    expect(() => c.read(failing)).toThrow('cannot build');
  });

  it('recovers once the dependency recovers', () => {
    const input = stateProvider(() => -1);
    const sqrt = provider(ref => {
      const n = ref.watch(input);
      if (n < 0) throw new RangeError('negative');
      return Math.sqrt(n);
    });
    const c = new ProviderContainer();
    const listener = vi.fn();
    c.listen(sqrt, listener, { onError: () => {} });

    expect(() => c.read(sqrt)).toThrow(RangeError);
    c.read(input.notifier).state = 9;
    expect(c.read(sqrt)).toBe(3);
    expect(listener).toHaveBeenCalledWith(3, undefined);
  });
});

describe('overrides and scopes', () => {
  const api = provider(() => 'real', { name: 'api' });
  const greeting = provider(ref => `hello ${ref.watch(api)}`);

  it('replaces a provider with a value or another build', () => {
    const byValue = new ProviderContainer({ overrides: [api.overrideWithValue('fake')] });
    expect(byValue.read(greeting)).toBe('hello fake');

    const byBuild = new ProviderContainer({ overrides: [api.overrideWith(() => 'built')] });
    expect(byBuild.read(greeting)).toBe('hello built');
  });

  it('overrides a state provider while keeping its controller', () => {
    const count = stateProvider(() => 0);
    const c = new ProviderContainer({ overrides: [count.overrideWithValue(7)] });
    expect(c.read(count)).toBe(7);
    c.read(count.notifier).update(n => n + 1);
    expect(c.read(count)).toBe(8);
  });

  it('child containers share non-overridden elements with their parent', () => {
    const count = stateProvider(() => 0);
    const root = new ProviderContainer();
    const child = new ProviderContainer({ parent: root, overrides: [api.overrideWithValue('child')] });

    expect(child.read(api)).toBe('child');
    expect(root.read(api)).toBe('real');

    root.read(count.notifier).state = 3;
    expect(child.read(count)).toBe(3);
    child.read(count.notifier).state = 4;
    expect(root.read(count)).toBe(4);
  });

  it('disposing a parent disposes its children', () => {
    const root = new ProviderContainer();
    const child = new ProviderContainer({ parent: root });
    root.dispose();
    expect(child.isDisposed).toBe(true);
    expect(() => new ProviderContainer({ parent: root })).toThrow(DisposedError);
  });
});

describe('ProviderObserver', () => {
  class Log extends ProviderObserver {
    readonly log: string[] = [];

    private static show(v: unknown): string {
      return typeof v === 'object' && v !== null ? 'object' : String(v);
    }

    override didAddProvider(p: ProviderInfo, value: unknown): void {
      this.log.push(`add ${p.name}=${Log.show(value)}`);
    }

    override didUpdateProvider(p: ProviderInfo, previous: unknown, next: unknown): void {
      this.log.push(`update ${p.name} ${Log.show(previous)}->${Log.show(next)}`);
    }

    override didDisposeProvider(p: ProviderInfo): void {
      this.log.push(`dispose ${p.name}`);
    }

    override providerDidFail(p: ProviderInfo, error: unknown): void {
      this.log.push(`fail ${p.name} ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  it('sees every lifecycle step', () => {
    const count = stateProvider(() => 0, { name: 'count' });
    const broken = provider((): unknown => JSON.parse('{'), { name: 'broken' });
    const observer = new Log();
    const c = new ProviderContainer({ observers: [observer] });

    c.read(count);
    c.read(count.notifier).state = 1;
    expect(() => c.read(broken)).toThrow(SyntaxError);
    c.dispose();

    expect(observer.log.slice(0, 3)).toEqual(['add count=0', 'add count.notifier=object', 'update count 0->1']);
    expect(observer.log[3]).toMatch(/^fail broken /);
    expect(observer.log.slice(4)).toEqual(['dispose count', 'dispose count.notifier', 'dispose broken']);
  });

  it('parents observe elements created in child containers', () => {
    const local = provider(() => 'local', { name: 'local' });
    const observer = new Log();
    const root = new ProviderContainer({ observers: [observer] });
    const child = new ProviderContainer({ parent: root, overrides: [local.overrideWithValue('scoped')] });

    child.read(local);
    expect(observer.log).toEqual(['add local=scoped']);
  });

  it('still updates dependents and listeners when an observer throws', () => {
    class Failing extends ProviderObserver {
      override didUpdateProvider(): void {
        throw new Error('observer down');
      }
    }
    const count = stateProvider(() => 0);
    const doubled = provider(ref => ref.watch(count) * 2);
    const c = new ProviderContainer({ observers: [new Failing()] });
    const listener = vi.fn();
    c.listen(count, listener);
    expect(c.read(doubled)).toBe(0);

    let thrown: unknown;
    try {
      c.read(count.notifier).state = 1;
    } catch (e) {
      thrown = e;
    }

    expect(thrown).toBeInstanceOf(ListenerError);
    expect(listener).toHaveBeenCalledWith(1, 0);
    expect(c.read(count)).toBe(1);
    expect(c.read(doubled)).toBe(2);
  });
});
