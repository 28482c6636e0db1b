import { parseDateTime } from "../shared/datetime.js";
import { InterpretationError } from "../shared/errors.js";
import { orderedEntries } from "../shared/json.js";
import { isRecord, type BridgeStatus, type FieldSet, type SourceRecord } from "../shared/record.js";

export type StatusInference = {
  isOpen: boolean;
  summary: string;
};

export type StatusRule = (fields: FieldSet) => StatusInference | null;

export const OPEN_KEYWORDS = [
  "open",
  "weer open",
  "openstaand",
  "open voor verkeer",
  "open voor scheepvaart",
  "vrijgegeven"
] as const;

export const CLOSED_KEYWORDS = ["dicht", "gesloten", "afgesloten", "gestremd", "stremming"] as const;

const OPEN_KEY_TOKENS = ["open", "start", "begin"];
const CLOSE_KEY_TOKENS = ["dicht", "sluit", "eind", "close"];

const containsAny = (text: string, needles: readonly string[]) => needles.some((needle) => text.includes(needle));

const latest = (dates: Date[]): Date | null =>
  dates.reduce<Date | null>((max, date) => (max === null || date.getTime() > max.getTime() ? date : max), null);

export const extractFields = (record: SourceRecord): FieldSet => {
  const nested = record.fields;
  return new Map(orderedEntries(isRecord(nested) ? nested : record));
};

export const determineObservedAt = (record: SourceRecord, fields: FieldSet): Date | null => {
  const candidates: Date[] = [];
  const recordTimestamp = parseDateTime(record.record_timestamp);
  if (recordTimestamp) candidates.push(recordTimestamp);
  for (const value of fields.values()) {
    const parsed = parseDateTime(value);
    if (parsed) candidates.push(parsed);
  }
  return latest(candidates);
};

export const statusFromTextualFields: StatusRule = (fields) => {
  for (const [key, value] of fields) {
    if (typeof value !== "string") continue;
    const normalized = value.trim().toLowerCase();
    if (!normalized) continue;
    if (containsAny(normalized, OPEN_KEYWORDS)) {
      return { isOpen: true, summary: `Veld '${key}' meldt: ${value}` };
    }
    if (containsAny(normalized, CLOSED_KEYWORDS)) {
      return { isOpen: false, summary: `Veld '${key}' meldt: ${value}` };
    }
  }
  return null;
};

/**
 * Compares the latest opening-like and closing-like timestamps. A key can
 * count for both sides ("opening_einde"); a tie means closed.
 */
export const statusFromTemporalFields: StatusRule = (fields) => {
  const openCandidates: Date[] = [];
  const closeCandidates: Date[] = [];
  for (const [key, value] of fields) {
    const parsed = parseDateTime(value);
    if (!parsed) continue;
    const lowerKey = key.toLowerCase();
    if (containsAny(lowerKey, OPEN_KEY_TOKENS)) openCandidates.push(parsed);
    if (containsAny(lowerKey, CLOSE_KEY_TOKENS)) closeCandidates.push(parsed);
  }

  const openAt = latest(openCandidates);
  const closeAt = latest(closeCandidates);
  if (openAt && (!closeAt || closeAt.getTime() < openAt.getTime())) {
    return { isOpen: true, summary: "Laatste melding bevat geen sluitingstijd." };
  }
  if (closeAt && (!openAt || closeAt.getTime() >= openAt.getTime())) {
    return { isOpen: false, summary: "Laatste melding bevat een sluitingstijd." };
  }
  return null;
};

export const statusFromBooleanFields: StatusRule = (fields) => {
  for (const [key, value] of fields) {
    if (typeof value === "boolean") {
      return { isOpen: value, summary: `Booleaanse status in veld '${key}'.` };
    }
    if (typeof value === "number" && (value === 0 || value === 1)) {
      return { isOpen: value === 1, summary: `Numerieke status in veld '${key}'.` };
    }
  }
  return null;
};

// Tried in order; the first rule with an answer decides.
export const STATUS_RULES: readonly StatusRule[] = [
  statusFromTextualFields,
  statusFromTemporalFields,
  statusFromBooleanFields
];

export const inferStatus = (fields: FieldSet): StatusInference | null => {
  for (const rule of STATUS_RULES) {
    const inference = rule(fields);
    if (inference) return inference;
  }
  return null;
};

export const recordToStatus = (record: SourceRecord, sourceUrl: string): BridgeStatus | null => {
  const fields = extractFields(record);
  const inference = inferStatus(fields);
  if (!inference) return null;
  return {
    is_open: inference.isOpen,
    summary: inference.summary,
    observed_at: determineObservedAt(record, fields),
    source_url: sourceUrl,
    raw_fields: fields
  };
};

// Below every valid Date (±8.64e15 ms).
const observedTime = (status: BridgeStatus) =>
  status.observed_at ? status.observed_at.getTime() : Number.MIN_SAFE_INTEGER;

/**
 * Picks the most recent record that says something about the bridge.
 * Records without a timestamp rank below every dated one.
 */
export type Interpretation = {
  status: BridgeStatus;
  /** Records that produced no status. */
  skipped: number;
};

export const interpretRecords = (records: readonly SourceRecord[], sourceUrl: string): Interpretation => {
  if (records.length === 0) {
    throw new InterpretationError("empty", "Geen gegevens ontvangen van de open-data bron.");
  }

  const statuses = records
    .map((record) => recordToStatus(record, sourceUrl))
    .filter((status): status is BridgeStatus => status !== null);
  if (statuses.length === 0) {
    throw new InterpretationError("uninterpretable", "Kon de status niet interpreteren uit de brongegevens.");
  }

  // Array.prototype.sort is stable, so equal timestamps keep input order.
  statuses.sort((a, b) => observedTime(b) - observedTime(a));
  const status = statuses.find((candidate) => candidate.is_open !== null) ?? statuses[0];
  return { status, skipped: records.length - statuses.length };
};

export const interpret = (records: readonly SourceRecord[], sourceUrl: string): BridgeStatus =>
  interpretRecords(records, sourceUrl).status;
