/** Error codes carried in the payload of a CallError frame. */
export type CallErrorCode =
  | "NotImplemented"
  | "NotSupported"
  | "InternalError"
  | "ProtocolError"
  | "FormationViolation"
  | "GenericError";

/** Failures raised on the calling side that never travel over the wire. */
export type LocalErrorCode = "Timeout" | "ConnectionClosed" | "NotConnected";

export type ErrorCode = CallErrorCode | LocalErrorCode;

export interface CallErrorPayload {
  code: string;
  description: string;
  details?: unknown;
}

export function buildCallError(
  code: CallErrorCode,
  description: string,
  details?: unknown,
): CallErrorPayload {
  return details === undefined ? { code, description } : { code, description, details };
}

export function isCallErrorPayload(value: unknown): value is CallErrorPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    typeof value.code === "string" &&
    "description" in value &&
    typeof value.description === "string"
  );
}

export interface ProtocolErrorOptions {
  code: ErrorCode | string;
  details?: unknown;
  cause?: unknown;
}

export class ProtocolError extends Error {
  readonly code: ErrorCode | string;
  readonly details?: unknown;

  constructor(message: string, options: ProtocolErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProtocolError";
    this.code = options.code;
    this.details = options.details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static fromCallError(payload: unknown): ProtocolError {
    if (isCallErrorPayload(payload)) {
      return new ProtocolError(payload.description, {
        code: payload.code,
        details: payload.details,
      });
    }
    return new ProtocolError("Peer replied with an unrecognised error payload", {
      code: "GenericError",
      details: payload,
    });
  }

  toCallError(): CallErrorPayload {
    const code = isCallErrorCode(this.code) ? this.code : "GenericError";
    return buildCallError(code, this.message, this.details);
  }
}

const callErrorCodes: ReadonlySet<string> = new Set<CallErrorCode>([
  "NotImplemented",
  "NotSupported",
  "InternalError",
  "ProtocolError",
  "FormationViolation",
  "GenericError",
]);

export function isCallErrorCode(code: string): code is CallErrorCode {
  return callErrorCodes.has(code);
}

export function toProtocolError(error: unknown, code: ErrorCode = "InternalError"): ProtocolError {
  if (error instanceof ProtocolError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProtocolError(message, { code, cause: error });
}
