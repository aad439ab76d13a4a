export type Todo = { id: string; title: string; completed: boolean };

export type TodoFilter = "all" | "active" | "completed";

export type TodoStats = { total: number; active: number; completed: number };

export function filterTodos(todos: readonly Todo[], filter: TodoFilter): Todo[] {
  switch (filter) {
    case "all":
      return [...todos];
    case "active":
      return todos.filter(t => !t.completed);
    case "completed":
      return todos.filter(t => t.completed);
  }
}

export function todoStats(todos: readonly Todo[]): TodoStats {
  const completed = todos.filter(t => t.completed).length;
  return { total: todos.length, active: todos.length - completed, completed };
}
