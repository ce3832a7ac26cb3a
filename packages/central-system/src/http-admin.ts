import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import { z } from "zod";
import {
  ProtocolError,
  type ChangeConfigurationResponse,
  type ConfigValue,
  type GetConfigurationResponse,
} from "@ocpp-lite/protocol";
import type { DeviceAdmin, DeviceSummary } from "./admin.js";

const deviceListSchema = z.object({
  devices: z.array(
    z.object({
      identity: z.string(),
      model: z.string(),
      vendor: z.string(),
      connectedAt: z.string(),
    }),
  ),
});

const getConfigurationResponseSchema = z.object({
  configurationKey: z.array(
    z.object({
      key: z.string(),
      value: z.union([z.string(), z.number()]),
      readonly: z.boolean(),
    }),
  ),
  unknownKey: z.array(z.string()),
});

const changeConfigurationResponseSchema = z.object({
  status: z.enum(["Accepted", "Rejected", "RebootRequired", "NotSupported"]),
});

const errorBodySchema = z.object({
  error: z.string(),
  message: z.string(),
  code: z.string().optional(),
});

const errorCodes: Record<string, string> = {
  device_not_connected: "NotConnected",
  timeout: "Timeout",
  connection_closed: "ConnectionClosed",
  invalid_request: "FormationViolation",
  internal: "InternalError",
};

/** {@link DeviceAdmin} backed by the HTTP admin facade of a running central system. */
export class HttpDeviceAdmin implements DeviceAdmin {
  constructor(private readonly http: AxiosInstance) {}

  static fromUrl(baseURL: string, timeoutMs = 60_000): HttpDeviceAdmin {
    return new HttpDeviceAdmin(axios.create({ baseURL, timeout: timeoutMs }));
  }

  async listDevices(): Promise<DeviceSummary[]> {
    const response = await this.http.get<unknown>("/devices", { validateStatus: () => true });
    return parseBody(response, deviceListSchema).devices;
  }

  async getConfiguration(identity: string, keys: string[] = []): Promise<GetConfigurationResponse> {
    const query = new URLSearchParams(keys.map((key): [string, string] => ["key", key])).toString();
    const path = `${devicePath(identity)}/configuration${query ? `?${query}` : ""}`;
    const response = await this.http.get<unknown>(path, { validateStatus: () => true });
    return parseBody(response, getConfigurationResponseSchema);
  }

  async changeConfiguration(
    identity: string,
    key: string,
    value: ConfigValue,
  ): Promise<ChangeConfigurationResponse> {
    const response = await this.http.post<unknown>(
      `${devicePath(identity)}/configuration`,
      { key, value },
      { validateStatus: () => true },
    );
    return parseBody(response, changeConfigurationResponseSchema);
  }
}

function devicePath(identity: string): string {
  return `/devices/${encodeURIComponent(identity)}`;
}

function parseBody<Schema extends z.ZodTypeAny>(
  response: AxiosResponse<unknown>,
  schema: Schema,
): z.infer<Schema> {
  if (response.status < 200 || response.status >= 300) {
    throw toAdminError(response);
  }
  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    throw new ProtocolError(`Unexpected admin API response: ${parsed.error.message}`, {
      code: "FormationViolation",
      details: response.data,
    });
  }
  return parsed.data;
}

function toAdminError(response: AxiosResponse<unknown>): ProtocolError {
  const body = errorBodySchema.safeParse(response.data);
  if (!body.success) {
    return new ProtocolError(`Admin API answered ${response.status}`, {
      code: "GenericError",
      details: response.data,
    });
  }
  const code = body.data.code ?? errorCodes[body.data.error] ?? "GenericError";
  return new ProtocolError(body.data.message, { code });
}
