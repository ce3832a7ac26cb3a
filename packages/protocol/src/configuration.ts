import type { ConfigurationStatus, ConfigValue, GetConfigurationResponse, KeyValue } from "./actions.js";

export interface ConfigEntry {
  key: string;
  value: ConfigValue;
  readonly: boolean;
}

export type ChangeStatus = Extract<ConfigurationStatus, "Accepted" | "Rejected">;

const INTEGER = /^[+-]?\d+$/;

/** Coerces `value` to the type of `current`, or returns undefined when it cannot. */
export function coerceConfigValue(current: ConfigValue, value: ConfigValue): ConfigValue | undefined {
  if (typeof current === "string") {
    return String(value);
  }

  if (typeof value === "number") {
    return Number.isInteger(value) ? value : undefined;
  }

  const trimmed = value.trim();
  if (!INTEGER.test(trimmed)) {
    return undefined;
  }
  const parsed = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Key/value configuration of one device. The key set is fixed when the store
 * is built; later writes only ever update existing entries.
 */
export class ConfigurationStore {
  private readonly entries = new Map<string, ConfigEntry>();

  constructor(entries: Iterable<ConfigEntry> = []) {
    for (const entry of entries) {
      this.entries.set(entry.key, { ...entry });
    }
  }

  get keys(): string[] {
    return Array.from(this.entries.keys());
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): ConfigValue | undefined {
    return this.entries.get(key)?.value;
  }

  getInteger(key: string): number | undefined {
    const value = this.get(key);
    return typeof value === "number" ? value : undefined;
  }

  read(keys?: readonly string[]): GetConfigurationResponse {
    if (!keys || keys.length === 0) {
      return {
        configurationKey: Array.from(this.entries.values(), toKeyValue),
        unknownKey: [],
      };
    }

    const configurationKey: KeyValue[] = [];
    const unknownKey: string[] = [];
    for (const key of keys) {
      const entry = this.entries.get(key);
      if (entry) {
        configurationKey.push(toKeyValue(entry));
      } else {
        unknownKey.push(key);
      }
    }
    return { configurationKey, unknownKey };
  }

  /** Remote write: refuses unknown keys, readonly keys and values of the wrong type. */
  change(key: string, value: ConfigValue): ChangeStatus {
    const entry = this.entries.get(key);
    if (!entry || entry.readonly) {
      return "Rejected";
    }
    return this.update(entry, value) ? "Accepted" : "Rejected";
  }

  /** Owner write: ignores the readonly flag but still never creates keys. */
  assign(key: string, value: ConfigValue): boolean {
    const entry = this.entries.get(key);
    return entry ? this.update(entry, value) : false;
  }

  private update(entry: ConfigEntry, value: ConfigValue): boolean {
    const coerced = coerceConfigValue(entry.value, value);
    if (coerced === undefined) {
      return false;
    }
    entry.value = coerced;
    return true;
  }
}

function toKeyValue(entry: ConfigEntry): KeyValue {
  return { key: entry.key, value: entry.value, readonly: entry.readonly };
}
