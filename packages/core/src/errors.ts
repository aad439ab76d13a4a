/**
 * Error hierarchy shared by blocs, notifiers and provider containers.
 *
 * Every error carries a stable `code` so callers (and the inspector
 * server) can branch on it without string matching.
 */

export type UnistateErrorCode =
  | 'STATE_CLOSED'
  | 'STATE_DISPOSED'
  | 'HANDLER_DUPLICATE'
  | 'HANDLER_MISSING'
  | 'HANDLER_COMPLETED'
  | 'PROVIDER_CIRCULAR'
  | 'LISTENER_FAILED'
  | 'STORAGE_MISSING';

export class UnistateError extends Error {
  constructor(
    readonly code: UnistateErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { name: string; code: UnistateErrorCode; message: string; details: Record<string, unknown> } {
    return { name: this.name, code: this.code, message: this.message, details: this.details };
  }
}

/** `add` or `emit` on a bloc or cubit after `close()`. */
export class ClosedError extends UnistateError {
  constructor(owner: string, action: 'add' | 'emit') {
    super('STATE_CLOSED', `Cannot ${action} on ${owner} after calling close`, { owner, action });
  }
}

/** Use of a notifier, container or provider element after disposal. */
export class DisposedError extends UnistateError {
  constructor(owner: string) {
    super('STATE_DISPOSED', `${owner} was used after being disposed`, { owner });
  }
}

export class HandlerError extends UnistateError {
  constructor(
    code: 'HANDLER_DUPLICATE' | 'HANDLER_MISSING' | 'HANDLER_COMPLETED',
    message: string,
    details: Record<string, unknown> = {},
  ) {
    super(code, message, details);
  }

  static duplicate(owner: string, type: string): HandlerError {
    return new HandlerError('HANDLER_DUPLICATE', `on('${type}') was called multiple times on ${owner}`, { owner, type });
  }

  static missing(owner: string, type: string): HandlerError {
    return new HandlerError(
      'HANDLER_MISSING',
      `add('${type}') was called without a registered event handler on ${owner}`,
      { owner, type },
    );
  }

  static completed(owner: string, type: string): HandlerError {
    return new HandlerError(
      'HANDLER_COMPLETED',
      `emit was called after the '${type}' handler on ${owner} completed; await async work inside the handler`,
      { owner, type },
    );
  }
}

export class CircularDependencyError extends UnistateError {
  constructor(readonly path: readonly string[]) {
    super('PROVIDER_CIRCULAR', `Circular provider dependency: ${path.join(' -> ')}`, { path: [...path] });
  }
}

/** One or more listeners threw while being notified. */
export class ListenerError extends UnistateError {
  constructor(readonly errors: readonly unknown[]) {
    super('LISTENER_FAILED', `${errors.length} listener(s) threw during notification`, {
      messages: errors.map(e => (e instanceof Error ? e.message : String(e))),
    });
  }
}

/** A hydrated bloc was created with no storage passed and none registered. */
export class StorageMissingError extends UnistateError {
  constructor(owner: string) {
    super('STORAGE_MISSING', `${owner} needs a HydratedStorage; call setHydratedStorage() first`, { owner });
  }
}

export function isUnistateError(error: unknown): error is UnistateError {
  return error instanceof UnistateError;
}
