/**
 * An event is a plain description of intent. The `type` string is the
 * discriminant handlers are registered against.
 */
export type BlocEvent = { readonly type: string };

/** Narrow an event union to the member with the given `type`. */
export type EventOfType<E extends BlocEvent, K extends E['type']> = Extract<E, { type: K }>;

/** A state change as observed on any bloc or cubit. */
export type Change<S> = { readonly currentState: S; readonly nextState: S };

/** A state change together with the event that caused it. */
export type Transition<E, S> = Change<S> & { readonly event: E };

export type Listener<T> = (next: T, previous: T | undefined) => void;

export type Unsubscribe = () => void;

export type Equals<T> = (a: T, b: T) => boolean;
