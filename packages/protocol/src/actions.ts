import type { PayloadValidator } from "./validator.js";

export type ConfigValue = string | number;

export interface BootNotificationRequest {
  chargePointVendor: string;
  chargePointModel: string;
  chargePointSerialNumber: string;
  firmwareVersion?: string;
}

export type RegistrationStatus = "Accepted" | "Pending" | "Rejected";

export interface BootNotificationResponse {
  status: RegistrationStatus;
  currentTime: string;
  /** Heartbeat interval in seconds. */
  interval: number;
}

export type HeartbeatRequest = Record<string, never>;

export interface HeartbeatResponse {
  currentTime: string;
}

export interface GetConfigurationRequest {
  key?: string[];
}

export interface KeyValue {
  key: string;
  value: ConfigValue;
  readonly: boolean;
}

export interface GetConfigurationResponse {
  configurationKey: KeyValue[];
  unknownKey: string[];
}

export interface ChangeConfigurationRequest {
  key: string;
  value: ConfigValue;
}

export type ConfigurationStatus = "Accepted" | "Rejected" | "RebootRequired" | "NotSupported";

export interface ChangeConfigurationResponse {
  status: ConfigurationStatus;
}

export interface ActionMap {
  BootNotification: { request: BootNotificationRequest; response: BootNotificationResponse };
  Heartbeat: { request: HeartbeatRequest; response: HeartbeatResponse };
  GetConfiguration: { request: GetConfigurationRequest; response: GetConfigurationResponse };
  ChangeConfiguration: {
    request: ChangeConfigurationRequest;
    response: ChangeConfigurationResponse;
  };
}

export type Action = keyof ActionMap;
export type RequestOf<A extends Action> = ActionMap[A]["request"];
export type ResponseOf<A extends Action> = ActionMap[A]["response"];

export interface RoleActions {
  central: {
    inbound: "BootNotification" | "Heartbeat";
    outbound: "GetConfiguration" | "ChangeConfiguration";
  };
  point: {
    inbound: "GetConfiguration" | "ChangeConfiguration";
    outbound: "BootNotification" | "Heartbeat";
  };
}

export type Role = keyof RoleActions;
export type InboundAction<R extends Role> = Extract<RoleActions[R]["inbound"], Action>;
export type OutboundAction<R extends Role> = Extract<RoleActions[R]["outbound"], Action>;

export const ACTIONS = [
  "BootNotification",
  "Heartbeat",
  "GetConfiguration",
  "ChangeConfiguration",
] as const satisfies readonly Action[];

const actionNames: ReadonlySet<string> = new Set<string>(ACTIONS);

export function isAction(name: string): name is Action {
  return actionNames.has(name);
}

export function responseSchemaName(action: Action): `${Action}Response` {
  return `${action}Response`;
}

export function isValidRequest<A extends Action>(
  validator: PayloadValidator,
  action: A,
  payload: unknown,
): payload is RequestOf<A> {
  return validator.validate(action, payload);
}

export function isValidResponse<A extends Action>(
  validator: PayloadValidator,
  action: A,
  payload: unknown,
): payload is ResponseOf<A> {
  return validator.validate(responseSchemaName(action), payload);
}
