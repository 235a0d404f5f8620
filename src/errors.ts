export const ERR = {
  INVALID_TIME_VALUE: "DCS_INVALID_TIME_VALUE",
  INVALID_RANGE: "DCS_INVALID_RANGE",
  TRANSPORT_ERROR: "DCS_TRANSPORT_ERROR",
  REQUEST_FAILED: "DCS_REQUEST_FAILED",
  INVALID_CHANNEL: "DCS_INVALID_CHANNEL",
  MALFORMED_RESPONSE: "DCS_MALFORMED_RESPONSE",
} as const;

export type ErrorCode = (typeof ERR)[keyof typeof ERR];

export class DcsError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidTimeValue extends DcsError {
  constructor(message: string, details?: unknown) {
    super(ERR.INVALID_TIME_VALUE, message, details);
  }
}

export class InvalidRange extends DcsError {
  constructor(message: string, details?: unknown) {
    super(ERR.INVALID_RANGE, message, details);
  }
}

export class TransportError extends DcsError {
  constructor(message: string, details?: unknown) {
    super(ERR.TRANSPORT_ERROR, message, details);
  }
}

/** Non-success reply from the server, other than a honoured rate limit. */
export class RequestFailed extends DcsError {
  readonly status: number;

  constructor(status: number, message: string, details?: unknown) {
    super(ERR.REQUEST_FAILED, message, details);
    this.status = status;
  }
}

export class InvalidChannel extends DcsError {
  readonly status?: number;

  constructor(message: string, status?: number, details?: unknown) {
    super(ERR.INVALID_CHANNEL, message, details);
    this.status = status;
  }
}

export class MalformedResponse extends DcsError {
  constructor(message: string, details?: unknown) {
    super(ERR.MALFORMED_RESPONSE, message, details);
  }
}

export function errMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
