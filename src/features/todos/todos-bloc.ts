import { randomUUID } from "crypto";
import { Bloc, restartable, sequential, type BlocOptions, type Emitter } from "@unistate/core";
import type { Todo, TodoFilter } from "./todo";
import type { TodosRepository } from "./todos-repository";

export type TodosEvent =
  | { type: "load" }
  | { type: "added"; title: string }
  | { type: "toggled"; id: string }
  | { type: "removed"; id: string }
  | { type: "filterChanged"; filter: TodoFilter };

export type TodosStatus = "initial" | "loading" | "loaded" | "failure";

export type TodosState = {
  status: TodosStatus;
  todos: readonly Todo[];
  filter: TodoFilter;
  error?: string;
};

export type TodosBlocOptions = BlocOptions<TodosState> & { nextId?: () => string };

export const initialTodosState: TodosState = { status: "initial", todos: [], filter: "all" };

/**
 * Todo list with a repository behind it. A newer `load` cancels the one in
 * flight; edits of one kind run one at a time and are saved after each change.
 */
export class TodosBloc extends Bloc<TodosEvent, TodosState> {
  private readonly nextId: () => string;

  constructor(
    private readonly repository: TodosRepository,
    opts: TodosBlocOptions = {},
  ) {
    super(initialTodosState, opts);
    this.nextId = opts.nextId ?? randomUUID;

    this.on(
      "load",
      async (_, emit) => {
        emit({ ...this.state, status: "loading", error: undefined });
        try {
          const todos = await this.repository.fetchAll();
          emit({ ...this.state, status: "loaded", todos, error: undefined });
        } catch (e) {
          emit({ ...this.state, status: "failure", error: e instanceof Error ? e.message : String(e) });
        }
      },
      restartable(),
    );
    this.on(
      "added",
      (event, emit) => this.save(emit, [...this.state.todos, { id: this.nextId(), title: event.title, completed: false }]),
      sequential(),
    );
    this.on(
      "toggled",
      (event, emit) => this.save(emit, this.state.todos.map(t => (t.id === event.id ? { ...t, completed: !t.completed } : t))),
      sequential(),
    );
    this.on("removed", (event, emit) => this.save(emit, this.state.todos.filter(t => t.id !== event.id)), sequential());
    this.on("filterChanged", (event, emit) => emit({ ...this.state, filter: event.filter }));
  }

  private async save(emit: Emitter<TodosState>, todos: readonly Todo[]): Promise<void> {
    emit({ ...this.state, todos });
    await this.repository.saveAll(todos);
  }
}
