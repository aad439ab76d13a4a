import { describe, it, expect } from 'vitest';
import { AsyncValue, ProviderContainer } from '@unistate/core';
import {
  InMemoryTodosRepository,
  TodosBloc,
  TodosNotifier,
  filteredTodosProvider,
  remoteTodosProvider,
  todoByIdProvider,
  todoFilterProvider,
  todoStatsProvider,
  todosProvider,
  todosRepositoryProvider,
  type Todo,
  type TodosRepository,
} from '../index';

const sequentialIds = () => {
  let n = 0;
  return () => `t${++n}`;
};

const stored: Todo[] = [
  { id: 'a', title: 'write tests', completed: true },
  { id: 'b', title: 'ship', completed: false },
];

describe('TodosBloc', () => {
  it('loads todos from the repository', async () => {
    const bloc = new TodosBloc(new InMemoryTodosRepository(stored));
    const statuses: string[] = [];
    bloc.subscribe(s => statuses.push(s.status));
    bloc.add({ type: 'load' });
    await bloc.idle();

    expect(statuses).toEqual(['loading', 'loaded']);
    expect(bloc.state.todos).toEqual(stored);
  });

  it('reports a failing load', async () => {
    const failing: TodosRepository = {
      fetchAll: () => Promise.reject(new Error('offline')),
      saveAll: async () => {},
    };
    const bloc = new TodosBloc(failing);
    bloc.add({ type: 'load' });
    await bloc.idle();
    expect(bloc.state).toMatchObject({ status: 'failure', error: 'offline', todos: [] });
  });

  it('adds, toggles and removes todos and saves each change', async () => {
    const repository = new InMemoryTodosRepository();
    const bloc = new TodosBloc(repository, { nextId: sequentialIds() });
    bloc.add({ type: 'added', title: 'one' });
    await bloc.idle();
    bloc.add({ type: 'added', title: 'two' });
    await bloc.idle();
    bloc.add({ type: 'toggled', id: 't1' });
    await bloc.idle();
    bloc.add({ type: 'removed', id: 't2' });
    await bloc.idle();

    expect(bloc.state.todos).toEqual([{ id: 't1', title: 'one', completed: true }]);
    expect(await repository.fetchAll()).toEqual([{ id: 't1', title: 'one', completed: true }]);
  });

  it('changes the filter', async () => {
    const bloc = new TodosBloc(new InMemoryTodosRepository());
    bloc.add({ type: 'filterChanged', filter: 'completed' });
    await bloc.idle();
    expect(bloc.state.filter).toBe('completed');
  });
});

describe('todo providers', () => {
  const setup = () => {
    const container = new ProviderContainer({
      overrides: [todosProvider.overrideWith(() => new TodosNotifier(sequentialIds()))],
    });
    const todos = container.read(todosProvider.notifier);
    return { container, todos };
  };

  it('filters and counts todos', () => {
    const { container, todos } = setup();
    todos.add('one');
    todos.add('two');
    todos.toggle('t1');

    expect(container.read(todoStatsProvider)).toEqual({ total: 2, active: 1, completed: 1 });
    container.read(todoFilterProvider.notifier).state = 'active';
    expect(container.read(filteredTodosProvider)).toEqual([{ id: 't2', title: 'two', completed: false }]);
    container.read(todoFilterProvider.notifier).state = 'completed';
    expect(container.read(filteredTodosProvider).map(t => t.id)).toEqual(['t1']);
  });

  it('looks todos up by id', () => {
    const { container, todos } = setup();
    todos.add('one');
    const seen: Array<Todo | undefined> = [];
    container.listen(todoByIdProvider('t1'), t => seen.push(t), { fireImmediately: true });

    todos.toggle('t1');
    todos.remove('t1');
    expect(seen).toEqual([
      { id: 't1', title: 'one', completed: false },
      { id: 't1', title: 'one', completed: true },
      undefined,
    ]);
    expect(todoByIdProvider('t1')).toBe(todoByIdProvider('t1'));
  });

  it('loads from and saves to the repository', async () => {
    const repository = new InMemoryTodosRepository(stored);
    const container = new ProviderContainer({
      overrides: [todosRepositoryProvider.overrideWithValue(repository)],
    });
    const todos = container.read(todosProvider.notifier);
    await todos.load();
    expect(container.read(todosProvider)).toEqual(stored);

    todos.remove('a');
    await todos.save();
    expect(await repository.fetchAll()).toEqual([stored[1]]);
  });

  it('fetches the remote list as an async value', async () => {
    const container = new ProviderContainer({
      overrides: [todosRepositoryProvider.overrideWithValue(new InMemoryTodosRepository(stored))],
    });
    expect(AsyncValue.isLoading(container.read(remoteTodosProvider))).toBe(true);
    await expect(container.read(remoteTodosProvider.future)).resolves.toEqual(stored);
    expect(container.read(remoteTodosProvider)).toEqual(AsyncValue.data(stored));
  });
});
