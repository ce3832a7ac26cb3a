import type {
  ChangeConfigurationResponse,
  ConfigValue,
  GetConfigurationResponse,
} from "@ocpp-lite/protocol";

export interface DeviceSummary {
  identity: string;
  model: string;
  vendor: string;
  connectedAt: string;
}

/** What an administrative surface can ask of the central system. */
export interface DeviceAdmin {
  listDevices(): Promise<DeviceSummary[]>;
  getConfiguration(identity: string, keys?: string[]): Promise<GetConfigurationResponse>;
  changeConfiguration(
    identity: string,
    key: string,
    value: ConfigValue,
  ): Promise<ChangeConfigurationResponse>;
}
