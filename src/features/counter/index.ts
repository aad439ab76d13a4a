export { CounterBloc, CounterCubit } from "./counter-bloc";
export type { CounterEvent } from "./counter-bloc";
export { counterProvider, doubledCounterProvider } from "./counter-providers";
