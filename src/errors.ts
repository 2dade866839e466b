export type ErrorCode = "E_DATA_LOAD" | "E_NOT_FOUND" | "E_GEOCODE" | "E_TRANSPORT" | "E_VALIDATION";

abstract class BotError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The persisted RVM table is missing or malformed. Fatal at startup. */
export class DataLoadError extends BotError {
  readonly code = "E_DATA_LOAD";
}

export class NotFoundError extends BotError {
  readonly code = "E_NOT_FOUND";

  constructor(readonly id: string) {
    super(`RVM not found: ${id}`);
  }
}

export class GeocodeError extends BotError {
  readonly code = "E_GEOCODE";
}

/** An outbound call to the chat platform failed. */
export class TransportError extends BotError {
  readonly code = "E_TRANSPORT";
}

export class ValidationError extends BotError {
  readonly code = "E_VALIDATION";

  constructor(
    readonly field: string,
    message: string
  ) {
    super(message);
  }
}
