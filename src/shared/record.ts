export type SourceRecord = Record<string, unknown>;

// Keys keep the order of the parsed payload; rules iterate in that order.
export type FieldSet = ReadonlyMap<string, unknown>;

export type BridgeStatus = {
  readonly is_open: boolean | null;
  readonly summary: string;
  readonly observed_at: Date | null;
  readonly source_url: string;
  readonly raw_fields: FieldSet;
};

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type StatusJson = {
  is_open: boolean | null;
  summary: string;
  observed_at: string | null; // ISO timestamp
  source_url: string;
  raw_fields: { [key: string]: JsonValue };
};

export const isRecord = (value: unknown): value is SourceRecord => {
  if (value === null || typeof value !== "object" || Array.isArray(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};
