import { Bloc, Cubit, type BlocOptions } from "@unistate/core";

export type CounterEvent = { type: "increment"; by?: number } | { type: "decrement"; by?: number } | { type: "reset" };

/** Counter driven by events. */
export class CounterBloc extends Bloc<CounterEvent, number> {
  constructor(private readonly initial = 0, opts?: BlocOptions<number>) {
    super(initial, opts);
    this.on("increment", (event, emit) => emit(this.state + (event.by ?? 1)));
    this.on("decrement", (event, emit) => emit(this.state - (event.by ?? 1)));
    this.on("reset", (_, emit) => emit(this.initial));
  }
}

/** The same counter with methods instead of events. */
export class CounterCubit extends Cubit<number> {
  constructor(private readonly initial = 0, opts?: BlocOptions<number>) {
    super(initial, opts);
  }

  increment(by = 1): void {
    this.emit(this.state + by);
  }

  decrement(by = 1): void {
    this.emit(this.state - by);
  }

  reset(): void {
    this.emit(this.initial);
  }
}
