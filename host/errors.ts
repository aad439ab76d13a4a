export type HostErrorCode = "BLOC_UNKNOWN" | "BLOC_NOT_DISPATCHABLE" | "EVENT_INVALID" | "HOST_STOPPED";

/** Rejected host requests. `status` is the HTTP status the inspector answers with. */
export class HostError extends Error {
  constructor(
    readonly code: HostErrorCode,
    message: string,
    readonly status = 400,
  ) {
    super(message);
    this.name = "HostError";
  }

  static unknownBloc(name: string): HostError {
    return new HostError("BLOC_UNKNOWN", `No bloc registered as '${name}'`, 404);
  }

  static notDispatchable(name: string): HostError {
    return new HostError("BLOC_NOT_DISPATCHABLE", `'${name}' does not accept events`);
  }

  static invalidEvent(detail: string): HostError {
    return new HostError("EVENT_INVALID", `Invalid event: ${detail}`);
  }

  static stopped(): HostError {
    return new HostError("HOST_STOPPED", "Host is shutting down", 503);
  }
}
