/**
 * The state of an asynchronous computation. `previous` carries the last
 * successful value while a refresh is loading or after it failed.
 */
export type AsyncLoading<T> = { readonly status: 'loading'; readonly previous?: { value: T } };
export type AsyncData<T> = { readonly status: 'data'; readonly value: T };
export type AsyncError<T> = { readonly status: 'error'; readonly error: unknown; readonly previous?: { value: T } };

export type AsyncValue<T> = AsyncLoading<T> | AsyncData<T> | AsyncError<T>;

export type AsyncHandlers<T, R> = {
  loading: (previous: { value: T } | undefined) => R;
  data: (value: T) => R;
  error: (error: unknown, previous: { value: T } | undefined) => R;
};

function loading<T>(previous?: { value: T }): AsyncLoading<T> {
  return previous ? { status: 'loading', previous } : { status: 'loading' };
}

function data<T>(value: T): AsyncData<T> {
  return { status: 'data', value };
}

function error<T>(err: unknown, previous?: { value: T }): AsyncError<T> {
  return previous ? { status: 'error', error: err, previous } : { status: 'error', error: err };
}

/** Run `fn`, capturing its outcome as data or error instead of rejecting. */
async function guard<T>(fn: () => Promise<T>): Promise<AsyncData<T> | AsyncError<T>> {
  try {
    return data(await fn());
  } catch (e) {
    return error(e);
  }
}

/** The last known value: current data, or the value carried through loading/error. */
function lastValue<T>(v: AsyncValue<T>): { value: T } | undefined {
  switch (v.status) {
    case 'data':
      return { value: v.value };
    case 'loading':
    case 'error':
      return v.previous;
    default: {
      const _exhaustive: never = v;
      void _exhaustive;
      return undefined;
    }
  }
}

export const AsyncValue = {
  loading,
  data,
  error,
  guard,
  lastValue,

  when<T, R>(v: AsyncValue<T>, handlers: AsyncHandlers<T, R>): R {
    switch (v.status) {
      case 'loading':
        return handlers.loading(v.previous);
      case 'data':
        return handlers.data(v.value);
      case 'error':
        return handlers.error(v.error, v.previous);
    }
  },

  /** Current or previous value, or undefined. */
  valueOf<T>(v: AsyncValue<T>): T | undefined {
    return lastValue(v)?.value;
  },

  isLoading<T>(v: AsyncValue<T>): v is AsyncLoading<T> {
    return v.status === 'loading';
  },

  hasError<T>(v: AsyncValue<T>): v is AsyncError<T> {
    return v.status === 'error';
  },
};
