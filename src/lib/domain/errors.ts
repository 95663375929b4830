export type ConnectivityErrorCode = "NETWORK_ERROR" | "TIMEOUT" | "HTTP_ERROR" | "CANCELLED";

export type ProtocolErrorCode =
  | "MALFORMED_XML"
  | "MISSING_FIELD"
  | "INVALID_FIELD"
  | "OUTLET_COUNT_MISMATCH";

export type WattBoxErrorCode = ConnectivityErrorCode | ProtocolErrorCode;

export class WattBoxError extends Error {
  constructor(
    message: string,
    public readonly code: WattBoxErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "WattBoxError";

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The device could not be reached, did not answer in time, or refused the
 * request with a non-2xx status.
 */
export class ConnectivityError extends WattBoxError {
  constructor(
    message: string,
    code: ConnectivityErrorCode,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = "ConnectivityError";
  }
}

/**
 * The device answered, but the payload was malformed or inconsistent with the
 * cached outlet collection.
 */
export class ProtocolError extends WattBoxError {
  constructor(
    message: string,
    code: ProtocolErrorCode,
    public readonly payload?: string,
    options?: { cause?: unknown },
  ) {
    super(message, code, options);
    this.name = "ProtocolError";
  }
}

export function isConnectivityError(error: unknown): error is ConnectivityError {
  return error instanceof ConnectivityError;
}

export function isProtocolError(error: unknown): error is ProtocolError {
  return error instanceof ProtocolError;
}
