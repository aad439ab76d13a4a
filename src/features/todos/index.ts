export type { Todo, TodoFilter, TodoStats } from "./todo";
export { filterTodos, todoStats } from "./todo";
export type { TodosRepository } from "./todos-repository";
export { InMemoryTodosRepository } from "./todos-repository";
export { TodosBloc, initialTodosState } from "./todos-bloc";
export type { TodosEvent, TodosState, TodosStatus, TodosBlocOptions } from "./todos-bloc";
export {
  TodosNotifier,
  todosProvider,
  todoFilterProvider,
  filteredTodosProvider,
  todoStatsProvider,
  todoByIdProvider,
  remoteTodosProvider,
  todosRepositoryProvider,
} from "./todos-providers";
