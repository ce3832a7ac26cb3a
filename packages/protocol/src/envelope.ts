import type { RawData } from "ws";

/** WebSocket subprotocol both sides negotiate. */
export const OCPP_SUBPROTOCOL = "ocpp1.6";

export const MessageType = {
  Call: 2,
  CallResult: 3,
  CallError: 4,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

export interface CallFrame {
  type: typeof MessageType.Call;
  id: string;
  action: string;
  payload: unknown;
}

export interface CallResultFrame {
  type: typeof MessageType.CallResult;
  id: string;
  payload: unknown;
}

export interface CallErrorFrame {
  type: typeof MessageType.CallError;
  id: string;
  payload: unknown;
}

export type Envelope = CallFrame | CallResultFrame | CallErrorFrame;

export interface MalformedFrame {
  kind: "MalformedFrame";
  reason: string;
  raw: string;
}

export type DecodeOutcome =
  | { ok: true; envelope: Envelope }
  | { ok: false; error: MalformedFrame };

export function isCall(envelope: Envelope): envelope is CallFrame {
  return envelope.type === MessageType.Call;
}

export function isCallResult(envelope: Envelope): envelope is CallResultFrame {
  return envelope.type === MessageType.CallResult;
}

export function isCallError(envelope: Envelope): envelope is CallErrorFrame {
  return envelope.type === MessageType.CallError;
}

/** A missing payload goes out as `{}`; anything else, `null` included, as given. */
function withDefault(payload: unknown): unknown {
  return payload === undefined ? {} : payload;
}

export function encodeCall(id: string, action: string, payload: unknown): string {
  return JSON.stringify([MessageType.Call, id, action, withDefault(payload)]);
}

export function encodeResult(id: string, payload: unknown): string {
  return JSON.stringify([MessageType.CallResult, id, withDefault(payload)]);
}

export function encodeError(id: string, payload: unknown): string {
  return JSON.stringify([MessageType.CallError, id, withDefault(payload)]);
}

export function encodeEnvelope(envelope: Envelope): string {
  switch (envelope.type) {
    case MessageType.Call:
      return encodeCall(envelope.id, envelope.action, envelope.payload);
    case MessageType.CallResult:
      return encodeResult(envelope.id, envelope.payload);
    case MessageType.CallError:
      return encodeError(envelope.id, envelope.payload);
  }
}

export function rawDataToString(data: RawData | string): string {
  if (typeof data === "string") {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString("utf8");
  }
  return data.toString("utf8");
}

function malformed(reason: string, raw: string): DecodeOutcome {
  return { ok: false, error: { kind: "MalformedFrame", reason, raw } };
}

export function decode(data: RawData | string): DecodeOutcome {
  const raw = rawDataToString(data);

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return malformed(`invalid JSON: ${error instanceof Error ? error.message : String(error)}`, raw);
  }

  if (!Array.isArray(parsed)) {
    return malformed("frame is not an array", raw);
  }

  const elements: unknown[] = parsed;
  const [type, id] = elements;
  if (type !== MessageType.Call && type !== MessageType.CallResult && type !== MessageType.CallError) {
    return malformed(`unrecognised message type ${JSON.stringify(type)}`, raw);
  }

  const minimum = type === MessageType.Call ? 4 : 3;
  if (elements.length < minimum) {
    return malformed(`expected at least ${minimum} elements, got ${elements.length}`, raw);
  }

  if (typeof id !== "string") {
    return malformed("message id is not a string", raw);
  }

  if (type === MessageType.Call) {
    const action = elements[2];
    if (typeof action !== "string") {
      return malformed("call action is not a string", raw);
    }
    return { ok: true, envelope: { type, id, action, payload: elements[3] } };
  }

  return { ok: true, envelope: { type, id, payload: elements[2] } };
}
