import { randomUUID } from "crypto";
import { Notifier, family, futureProvider, notifierProvider, provider, stateProvider } from "@unistate/core";
import { filterTodos, todoStats, type Todo, type TodoFilter } from "./todo";
import { InMemoryTodosRepository, type TodosRepository } from "./todos-repository";

export const todosRepositoryProvider = provider<TodosRepository>(() => new InMemoryTodosRepository(), {
  name: "todosRepository",
});

export class TodosNotifier extends Notifier<readonly Todo[]> {
  constructor(private readonly nextId: () => string = randomUUID) {
    super();
  }

  build(): readonly Todo[] {
    return [];
  }

  add(title: string): Todo {
    const todo: Todo = { id: this.nextId(), title, completed: false };
    this.state = [...this.state, todo];
    return todo;
  }

  toggle(id: string): void {
    this.state = this.state.map(t => (t.id === id ? { ...t, completed: !t.completed } : t));
  }

  remove(id: string): void {
    this.state = this.state.filter(t => t.id !== id);
  }

  /** Replace the list with what the repository holds. */
  async load(): Promise<void> {
    this.state = await this.ref.read(todosRepositoryProvider).fetchAll();
  }

  async save(): Promise<void> {
    await this.ref.read(todosRepositoryProvider).saveAll(this.state);
  }
}

export const todosProvider = notifierProvider(() => new TodosNotifier(), { name: "todos" });

export const todoFilterProvider = stateProvider<TodoFilter>(() => "all", { name: "todoFilter" });

export const filteredTodosProvider = provider(ref => filterTodos(ref.watch(todosProvider), ref.watch(todoFilterProvider)), {
  name: "filteredTodos",
});

export const todoStatsProvider = provider(ref => todoStats(ref.watch(todosProvider)), { name: "todoStats" });

export const todoByIdProvider = family((id: string) =>
  provider(ref => ref.watch(todosProvider).find(t => t.id === id), { name: `todoById(${id})`, autoDispose: true }),
);

/** The repository's list, fetched again whenever the repository is replaced. */
export const remoteTodosProvider = futureProvider(ref => ref.watch(todosRepositoryProvider).fetchAll(), {
  name: "remoteTodos",
});
