import type { Todo } from "./todo";

export interface TodosRepository {
  fetchAll(): Promise<Todo[]>;
  saveAll(todos: readonly Todo[]): Promise<void>;
}

/** Keeps copies, so callers never share objects with the store. */
export class InMemoryTodosRepository implements TodosRepository {
  private todos: Todo[];

  constructor(initial: readonly Todo[] = []) {
    this.todos = initial.map(t => ({ ...t }));
  }

  async fetchAll(): Promise<Todo[]> {
    return this.todos.map(t => ({ ...t }));
  }

  async saveAll(todos: readonly Todo[]): Promise<void> {
    this.todos = todos.map(t => ({ ...t }));
  }
}
