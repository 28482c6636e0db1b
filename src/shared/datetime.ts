import { DateTime } from "luxon";

// Naive notations, read as UTC.
const FALLBACK_FORMATS = ["yyyy-M-d H:m:s", "yyyy-M-d H:m", "d-M-yyyy H:m:s", "d-M-yyyy H:m"];

// Luxon also reads bare times ("09:24") as today and lone years as dates;
// a notice needs at least a calendar day.
const CALENDAR_DATE = /^\d{4}-?(?:\d{2}-?\d{2}|W\d{2}|\d{3}(?!\d))/;

const toDate = (dt: DateTime): Date | null => (dt.isValid ? dt.toUTC().toJSDate() : null);

const fromEpoch = (value: number): Date | null => {
  if (!Number.isFinite(value)) return null;
  return toDate(value > 1e12 ? DateTime.fromMillis(value, { zone: "utc" }) : DateTime.fromSeconds(value, { zone: "utc" }));
};

const fromText = (text: string): Date | null => {
  if (CALENDAR_DATE.test(text)) {
    const iso = toDate(DateTime.fromISO(text, { zone: "utc", setZone: true }));
    if (iso) return iso;
    // "2024-04-20 11:00:00+02:00"
    const sql = toDate(DateTime.fromSQL(text, { zone: "utc", setZone: true }));
    if (sql) return sql;
  }
  for (const format of FALLBACK_FORMATS) {
    const parsed = toDate(DateTime.fromFormat(text, format, { zone: "utc" }));
    if (parsed) return parsed;
  }
  return null;
};

/**
 * Reads a timestamp out of whatever a data portal put in a field: a Date,
 * epoch seconds or milliseconds, an ISO-8601 string, or one of the common
 * Dutch notations. Values without an offset are taken as UTC.
 *
 * Returns null for anything it does not recognise.
 */
export const parseDateTime = (value: unknown): Date | null => {
  if (value instanceof Date) {
    return toDate(DateTime.fromJSDate(value));
  }
  if (typeof value === "number") {
    return fromEpoch(value);
  }
  if (typeof value !== "string") return null;

  const cleaned = value.trim();
  if (!cleaned) return null;
  return fromText(cleaned);
};
