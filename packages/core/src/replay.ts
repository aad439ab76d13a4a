import { Bloc } from './bloc';
import type { BlocOptions } from './bloc-base';
import { Cubit } from './cubit';
import type { BlocEvent } from './types';

export type ReplayOptions<S> = BlocOptions<S> & {
  /** Maximum number of undoable changes kept. Oldest entries are dropped first. */
  limit?: number;
};

/**
 * Undo/redo stacks of states. `record` is called with the state being
 * replaced; any new record clears the redo stack.
 */
export class ReplayHistory<S> {
  private past: S[] = [];
  private future: S[] = [];

  constructor(private readonly limit = Number.POSITIVE_INFINITY) {}

  get canUndo(): boolean {
    return this.past.length > 0;
  }

  get canRedo(): boolean {
    return this.future.length > 0;
  }

  record(previous: S): void {
    this.past.push(previous);
    if (this.past.length > this.limit) this.past.shift();
    this.future = [];
  }

  /** Step back from `current`. Returns the state to restore, or null when there is none. */
  undo(current: S): { state: S } | null {
    if (!this.past.length) return null;
    const [state] = this.past.splice(-1, 1);
    this.future.push(current);
    return { state };
  }

  redo(current: S): { state: S } | null {
    if (!this.future.length) return null;
    const [state] = this.future.splice(-1, 1);
    this.past.push(current);
    return { state };
  }

  clear(): void {
    this.past = [];
    this.future = [];
  }
}

/** A cubit whose state changes can be undone and redone. */
export class ReplayCubit<S> extends Cubit<S> {
  private readonly history: ReplayHistory<S>;

  constructor(initialState: S, opts: ReplayOptions<S> = {}) {
    super(initialState, opts);
    this.history = new ReplayHistory(opts.limit);
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  override emit(state: S): void {
    const previous = this.state;
    const duplicate = this.isDuplicate(state);
    super.emit(state);
    if (!duplicate && this.shouldReplay(state)) this.history.record(previous);
  }

  undo(): void {
    const step = this.history.undo(this.state);
    if (step) super.emit(step.state);
  }

  redo(): void {
    const step = this.history.redo(this.state);
    if (step) super.emit(step.state);
  }

  clearHistory(): void {
    this.history.clear();
  }

  /** Changes to states rejected here are applied but cannot be undone. */
  protected shouldReplay(_state: S): boolean {
    return true;
  }
}

/** A bloc whose state changes can be undone and redone. Undo and redo report changes, not transitions. */
export abstract class ReplayBloc<E extends BlocEvent, S> extends Bloc<E, S> {
  private readonly history: ReplayHistory<S>;

  constructor(initialState: S, opts: ReplayOptions<S> = {}) {
    super(initialState, opts);
    this.history = new ReplayHistory(opts.limit);
  }

  get canUndo(): boolean {
    return this.history.canUndo;
  }

  get canRedo(): boolean {
    return this.history.canRedo;
  }

  undo(): void {
    const step = this.history.undo(this.state);
    if (step) super.emit(step.state);
  }

  redo(): void {
    const step = this.history.redo(this.state);
    if (step) super.emit(step.state);
  }

  clearHistory(): void {
    this.history.clear();
  }

  protected override emit(state: S): void {
    const previous = this.state;
    const duplicate = this.isDuplicate(state);
    super.emit(state);
    if (!duplicate && this.shouldReplay(state)) this.history.record(previous);
  }

  protected shouldReplay(_state: S): boolean {
    return true;
  }
}
