import { DEFAULTS } from "../shared/config.js";
import { FetchError } from "../shared/errors.js";
import { parseOrderedJson } from "../shared/json.js";
import { isRecord, type SourceRecord } from "../shared/record.js";

export type SearchQuery = {
  dataset: string;
  q: string;
  rows: number;
  sort: string;
};

const RECORD_KEYS = ["records", "results", "data"] as const;

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

const decodeBody = (bytes: Uint8Array): string => {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    return Buffer.from(bytes).toString("latin1");
  }
};

/**
 * Client for the record search endpoint of an open data portal.
 *
 * One request per call, no retries. The URL of the latest call stays
 * available as `lastUrl`, also after a failed request.
 */
export class RecordFetcher {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private lastUrlValue: string | null = null;

  constructor(baseUrl: string, opts?: { timeoutMs?: number }) {
    this.baseUrl = baseUrl;
    this.timeoutMs = opts?.timeoutMs ?? DEFAULTS.timeoutMs;
  }

  get lastUrl(): string | null {
    return this.lastUrlValue;
  }

  buildUrl(query: SearchQuery): string {
    const params = new URLSearchParams({
      dataset: query.dataset,
      q: query.q,
      rows: String(query.rows),
      sort: query.sort
    });
    const separator = this.baseUrl.includes("?") ? "&" : "?";
    return `${this.baseUrl}${separator}${params.toString()}`;
  }

  async fetch(query: SearchQuery): Promise<unknown> {
    const url = this.buildUrl(query);
    this.lastUrlValue = url;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          Accept: "application/json",
          "User-Agent": "brugstatus/0.1"
        },
        signal: controller.signal
      });
    } catch (error) {
      clearTimeout(timeout);
      const detail = controller.signal.aborted ? `time-out na ${this.timeoutMs} ms` : describeError(error);
      throw new FetchError("network", `Netwerkfout tijdens ophalen gegevens: ${detail}`, { url, cause: error });
    }

    if (response.status >= 400) {
      clearTimeout(timeout);
      const message = `De open-data bron gaf een foutmelding (${response.status}).`;
      // Release the connection; the status decides the outcome either way.
      try {
        await response.body?.cancel();
      } catch (error) {
        throw new FetchError("http", message, { url, status: response.status, cause: error });
      }
      throw new FetchError("http", message, { url, status: response.status });
    }

    let bytes: Uint8Array;
    try {
      bytes = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      if (controller.signal.aborted) {
        throw new FetchError("network", `Netwerkfout tijdens ophalen gegevens: time-out na ${this.timeoutMs} ms`, {
          url,
          cause: error
        });
      }
      throw new FetchError("decode", "Kon de JSON-respons niet lezen.", { url, status: response.status, cause: error });
    } finally {
      clearTimeout(timeout);
    }

    try {
      return parseOrderedJson(decodeBody(bytes));
    } catch (error) {
      throw new FetchError("decode", "Kon de JSON-respons niet lezen.", { url, status: response.status, cause: error });
    }
  }
}

/** Records of a search response; tolerates the payload shapes of older API versions. */
export const extractRecords = (payload: unknown): SourceRecord[] => {
  if (!isRecord(payload)) return [];
  for (const key of RECORD_KEYS) {
    const value = payload[key];
    if (Array.isArray(value)) {
      return value.filter(isRecord);
    }
  }
  return [];
};
