import { isRecord, type BridgeStatus, type JsonValue, type StatusJson } from "../shared/record.js";

export type StatusLabel = "open" | "dicht" | "onbekend";

export const statusLabel = (status: BridgeStatus): StatusLabel => {
  if (status.is_open === true) return "open";
  if (status.is_open === false) return "dicht";
  return "onbekend";
};

/** Anything JSON cannot carry is replaced by its printable form. */
export const toJsonSafe = (value: unknown): JsonValue => {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? String(value) : value.toISOString();
  }
  if (value instanceof Map) {
    return Object.fromEntries(Array.from(value, ([key, item]): [string, JsonValue] => [String(key), toJsonSafe(item)]));
  }
  if (Array.isArray(value)) return value.map((item) => toJsonSafe(item));
  if (value instanceof Set) return Array.from(value, (item) => toJsonSafe(item));
  if (isRecord(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]): [string, JsonValue] => [key, toJsonSafe(item)]));
  }
  return String(value);
};

export const toStatusJson = (status: BridgeStatus): StatusJson => ({
  is_open: status.is_open,
  summary: status.summary,
  observed_at: status.observed_at ? status.observed_at.toISOString() : null,
  source_url: status.source_url,
  raw_fields: Object.fromEntries(Array.from(status.raw_fields, ([key, value]): [string, JsonValue] => [key, toJsonSafe(value)]))
});

export const renderJson = (status: BridgeStatus) => JSON.stringify(toStatusJson(status), null, 2);

export const renderText = (status: BridgeStatus, bridgeName: string) => {
  const observed = status.observed_at ? status.observed_at.toISOString() : "onbekend";
  return [
    `De ${bridgeName} is ${statusLabel(status)}. (${status.summary})`,
    `Laatste melding: ${observed}`,
    `Bron: ${status.source_url}`
  ].join("\n");
};
