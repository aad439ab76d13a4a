import { BlocBase } from './bloc-base';

/**
 * A bloc without events: methods compute the next state and `emit` it.
 *
 * @example
 * ```ts
 * class CounterCubit extends Cubit<number> {
 *   constructor() { super(0); }
 *   increment() { this.emit(this.state + 1); }
 * }
 * ```
 */
export class Cubit<S> extends BlocBase<S> {
  override emit(state: S): void {
    super.emit(state);
  }
}
