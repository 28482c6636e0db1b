import { describe, it, expect } from "vitest";
import {
  determineObservedAt,
  extractFields,
  inferStatus,
  interpret,
  interpretRecords,
  recordToStatus,
  statusFromBooleanFields,
  statusFromTemporalFields,
  statusFromTextualFields
} from "../../src/collector/interpreter.js";
import { InterpretationError } from "../../src/shared/errors.js";
import { parseOrderedJson } from "../../src/shared/json.js";
import { isRecord } from "../../src/shared/record.js";

const SOURCE = "https://data.example.test/search?dataset=brugopeningen";

const fieldsOf = (entries: Record<string, unknown>) => new Map(Object.entries(entries));

describe("extractFields", () => {
  it("unwraps a nested fields object", () => {
    const fields = extractFields({ recordid: "abc", fields: { melding: "open" } });
    expect(Array.from(fields.keys())).toEqual(["melding"]);
  });

  it("uses the record itself when fields is not an object", () => {
    const fields = extractFields({ melding: "dicht", fields: ["x"] });
    expect(Array.from(fields.keys())).toEqual(["melding", "fields"]);
  });

  it("keeps payload key order", () => {
    const record = parseOrderedJson('{"fields": {"z": 1, "a": 2, "10": 3, "m": 4, "2": 5}}');
    if (!isRecord(record)) throw new Error("expected an object");
    expect(Array.from(extractFields(record).keys())).toEqual(["z", "a", "10", "m", "2"]);
  });

  it("lets an earlier text field beat a later integer-like key", () => {
    const record = parseOrderedJson('{"fields": {"melding": "Brug weer open", "1": "gestremd"}}');
    if (!isRecord(record)) throw new Error("expected an object");
    const status = interpret([record], SOURCE);
    expect(status.is_open).toBe(true);
    expect(status.summary).toBe("Veld 'melding' meldt: Brug weer open");
  });
});

describe("determineObservedAt", () => {
  it("takes the latest of record_timestamp and field values", () => {
    const record = {
      record_timestamp: "2024-04-20T11:00:00+02:00",
      fields: { gemeld: "2024-04-20T12:30:00+02:00", tekst: "geen datum" }
    };
    expect(determineObservedAt(record, extractFields(record))?.toISOString()).toBe("2024-04-20T10:30:00.000Z");
  });

  it("is null when nothing parses", () => {
    const record = { fields: { melding: "open" } };
    expect(determineObservedAt(record, extractFields(record))).toBeNull();
  });
});

describe("statusFromTextualFields", () => {
  it("reports open for an open keyword and names the field", () => {
    expect(statusFromTextualFields(fieldsOf({ melding: "Brug weer open voor verkeer" }))).toEqual({
      isOpen: true,
      summary: "Veld 'melding' meldt: Brug weer open voor verkeer"
    });
  });

  it("reports closed for a closed keyword", () => {
    expect(statusFromTextualFields(fieldsOf({ opmerking: "  STREMMING wegens onderhoud " }))).toEqual({
      isOpen: false,
      summary: "Veld 'opmerking' meldt:   STREMMING wegens onderhoud "
    });
  });

  it("checks open keywords before closed ones within a field", () => {
    expect(statusFromTextualFields(fieldsOf({ melding: "Gesloten, daarna vrijgegeven" }))?.isOpen).toBe(true);
  });

  it("lets the first matching field win", () => {
    const inference = statusFromTextualFields(
      fieldsOf({ brug: "Hogebrug", status: "gestremd", toelichting: "weer open" })
    );
    expect(inference).toEqual({ isOpen: false, summary: "Veld 'status' meldt: gestremd" });
  });

  it("ignores non-string and blank values", () => {
    expect(statusFromTextualFields(fieldsOf({ a: 1, b: "  ", c: null, d: ["open"] }))).toBeNull();
  });
});

describe("statusFromTemporalFields", () => {
  it("reports open when there is no closing time", () => {
    expect(statusFromTemporalFields(fieldsOf({ opening_start: "2024-04-23T09:50:00+02:00" }))).toEqual({
      isOpen: true,
      summary: "Laatste melding bevat geen sluitingstijd."
    });
  });

  it("reports closed when the closing time is later", () => {
    const fields = fieldsOf({
      opening_start: "2024-04-24T09:50:00+02:00",
      sluiting: "2024-04-24T09:55:00+02:00"
    });
    expect(statusFromTemporalFields(fields)).toEqual({
      isOpen: false,
      summary: "Laatste melding bevat een sluitingstijd."
    });
  });

  it("reports open when the opening time is later", () => {
    const fields = fieldsOf({
      tijd_dicht: "2024-04-24T09:00:00Z",
      tijd_open: "2024-04-24T09:30:00Z"
    });
    expect(statusFromTemporalFields(fields)?.isOpen).toBe(true);
  });

  it("treats equal times as closed", () => {
    const fields = fieldsOf({ begin: "2024-04-24 09:00", eindtijd: "24-04-2024 09:00" });
    expect(statusFromTemporalFields(fields)?.isOpen).toBe(false);
  });

  it("treats a key on both sides as a tie, so closed", () => {
    expect(statusFromTemporalFields(fieldsOf({ opening_einde: "2024-04-24T09:00:00Z" }))).toEqual({
      isOpen: false,
      summary: "Laatste melding bevat een sluitingstijd."
    });
  });

  it("reports closed with only a closing time", () => {
    expect(statusFromTemporalFields(fieldsOf({ CloseTime: "2024-04-24T09:00:00Z" }))?.isOpen).toBe(false);
  });

  it("uses the latest time per side", () => {
    const fields = fieldsOf({
      start_1: "2024-04-24T08:00:00Z",
      sluit_1: "2024-04-24T08:30:00Z",
      start_2: "2024-04-24T09:00:00Z"
    });
    expect(statusFromTemporalFields(fields)?.isOpen).toBe(true);
  });

  it("yields nothing when no key is opening- or closing-like", () => {
    expect(statusFromTemporalFields(fieldsOf({ gemeld: "2024-04-24T09:00:00Z" }))).toBeNull();
  });
});

describe("statusFromBooleanFields", () => {
  it("maps booleans", () => {
    expect(statusFromBooleanFields(fieldsOf({ is_open: true }))).toEqual({
      isOpen: true,
      summary: "Booleaanse status in veld 'is_open'."
    });
    expect(statusFromBooleanFields(fieldsOf({ beschikbaar: false }))?.isOpen).toBe(false);
  });

  it("maps 0 and 1 and skips other numbers", () => {
    expect(statusFromBooleanFields(fieldsOf({ aantal: 7, status: 0 }))).toEqual({
      isOpen: false,
      summary: "Numerieke status in veld 'status'."
    });
    expect(statusFromBooleanFields(fieldsOf({ status: 1 }))?.isOpen).toBe(true);
    expect(statusFromBooleanFields(fieldsOf({ status: 0.5, label: "x" }))).toBeNull();
  });
});

describe("inferStatus", () => {
  it("prefers the textual rule over the others", () => {
    const inference = inferStatus(
      fieldsOf({ is_open: false, opening_start: "2024-04-23T09:50:00Z", melding: "Brug dicht" })
    );
    expect(inference?.summary).toBe("Veld 'melding' meldt: Brug dicht");
  });

  it("falls back to the temporal rule before the boolean one", () => {
    const inference = inferStatus(fieldsOf({ actief: false, opening_start: "2024-04-23T09:50:00Z" }));
    expect(inference?.isOpen).toBe(true);
  });
});

describe("recordToStatus", () => {
  it("builds a status for the worked textual record", () => {
    const status = recordToStatus(
      { record_timestamp: "2024-04-20T11:00:00+02:00", fields: { melding: "Brug weer open voor verkeer" } },
      SOURCE
    );
    expect(status?.is_open).toBe(true);
    expect(status?.summary).toContain("melding");
    expect(status?.summary.toLowerCase()).toContain("weer open");
    expect(status?.observed_at?.toISOString().slice(0, 10)).toBe("2024-04-20");
    expect(status?.source_url).toBe(SOURCE);
    expect(status?.raw_fields.get("melding")).toBe("Brug weer open voor verkeer");
  });

  it("returns null without any clue", () => {
    expect(recordToStatus({ fields: { brug: "Hogebrug", aantal: 3 } }, SOURCE)).toBeNull();
  });
});

describe("interpret", () => {
  it("throws an empty InterpretationError for no records", () => {
    expect(() => interpret([], SOURCE)).toThrow(InterpretationError);
    expect(() => interpret([], SOURCE)).toThrow("Geen gegevens ontvangen van de open-data bron.");
  });

  it("throws when no record can be interpreted", () => {
    try {
      interpret([{ fields: { brug: "Hogebrug" } }], SOURCE);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InterpretationError);
      expect(error).toMatchObject({ reason: "uninterpretable" });
    }
  });

  it("picks the most recent interpretable record regardless of input order", () => {
    const older = { record_timestamp: "2024-04-20T08:00:00Z", fields: { melding: "Brug dicht" } };
    const newer = { record_timestamp: "2024-04-20T10:00:00Z", fields: { melding: "Brug weer open" } };
    const noise = { record_timestamp: "2024-04-21T10:00:00Z", fields: { brug: "Hogebrug" } };

    for (const records of [
      [older, newer, noise],
      [noise, newer, older],
      [newer, older]
    ]) {
      const status = interpret(records, SOURCE);
      expect(status.summary).toBe("Veld 'melding' meldt: Brug weer open");
    }
  });

  it("ranks undated records below dated ones", () => {
    const undated = { fields: { melding: "Brug dicht" } };
    const dated = { record_timestamp: "2020-01-01T00:00:00Z", fields: { melding: "open" } };
    expect(interpret([undated, dated], SOURCE).is_open).toBe(true);
  });

  it("keeps input order for equal timestamps", () => {
    const first = { record_timestamp: "2024-04-20T08:00:00Z", fields: { a: "dicht" } };
    const second = { record_timestamp: "2024-04-20T08:00:00Z", fields: { b: "open" } };
    expect(interpret([first, second], SOURCE).summary).toBe("Veld 'a' meldt: dicht");
  });
});

describe("interpretRecords", () => {
  it("counts the records that gave no status", () => {
    const result = interpretRecords(
      [
        { fields: { brug: "Hogebrug" } },
        { record_timestamp: "2024-04-20T09:00:00Z", fields: { melding: "open" } },
        { fields: { opmerking: 42 } }
      ],
      SOURCE
    );
    expect(result.skipped).toBe(2);
    expect(result.status.summary).toBe("Veld 'melding' meldt: open");
  });

  it("reports nothing skipped when every record counts", () => {
    expect(interpretRecords([{ fields: { is_open: false } }], SOURCE).skipped).toBe(0);
  });
});
