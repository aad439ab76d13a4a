/**
 * The `emit` handed to an event handler. Callable, and able to drive
 * emissions from an async source for as long as the handler is active.
 */
export type Emitter<S> = {
  (state: S): void;
  /** True once the handler completed or was cancelled. */
  readonly isDone: boolean;
  /** Emit `onData(item)` for each item of `source` until it ends or the emitter is done. */
  forEach<T>(
    source: AsyncIterable<T>,
    onData: (data: T) => S,
    opts?: { onError?: (error: unknown) => S },
  ): Promise<void>;
  /** Call `onData` for each item of `source` until it ends or the emitter is done. */
  onEach<T>(
    source: AsyncIterable<T>,
    onData: (data: T) => void,
    opts?: { onError?: (error: unknown) => void },
  ): Promise<void>;
};

export type EmitterControl<S> = {
  readonly emitter: Emitter<S>;
  /** The handler finished; later emits are programming errors. */
  complete(): void;
  /** The handler was cancelled; later emits are ignored. */
  cancel(): void;
};

export function createEmitter<S>(sink: (state: S) => void, afterComplete: () => Error): EmitterControl<S> {
  let completed = false;
  let cancelled = false;
  const isDone = () => completed || cancelled;

  const emit = (state: S): void => {
    if (cancelled) return;
    if (completed) throw afterComplete();
    sink(state);
  };

  const onEach = async <T>(
    source: AsyncIterable<T>,
    onData: (data: T) => void,
    opts: { onError?: (error: unknown) => void } = {},
  ): Promise<void> => {
    try {
      for await (const data of source) {
        if (isDone()) break;
        onData(data);
      }
    } catch (e) {
      if (!opts.onError) throw e;
      if (!isDone()) opts.onError(e);
    }
  };

  const forEach = <T>(
    source: AsyncIterable<T>,
    onData: (data: T) => S,
    opts: { onError?: (error: unknown) => S } = {},
  ): Promise<void> => {
    const { onError } = opts;
    return onEach(source, data => emit(onData(data)), {
      onError: onError ? e => emit(onError(e)) : undefined,
    });
  };

  const emitter = Object.assign(emit, { forEach, onEach, isDone: false });

  return {
    emitter,
    complete() {
      completed = true;
      emitter.isDone = true;
    },
    cancel() {
      cancelled = true;
      emitter.isDone = true;
    },
  };
}
