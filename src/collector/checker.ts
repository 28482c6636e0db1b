import { DEFAULTS } from "../shared/config.js";
import type { BridgeStatus } from "../shared/record.js";
import { extractRecords, RecordFetcher } from "./fetcher.js";
import { interpretRecords } from "./interpreter.js";

/** Log callback for lookup diagnostics (dependency injection). */
export type LogCallback = (level: "error" | "warn" | "info", data: Record<string, unknown>) => void;

export type CheckerOptions = {
  bridgeName?: string;
  dataset?: string;
  baseUrl?: string;
  rows?: number;
  sort?: string;
  timeoutMs?: number;
  log?: LogCallback;
};

export interface StatusSource {
  getStatus(): Promise<BridgeStatus>;
}

/**
 * Looks up the current status of one bridge: a single search request,
 * then interpretation of whatever records come back.
 */
export class BridgeStatusChecker implements StatusSource {
  readonly bridgeName: string;
  readonly dataset: string;
  readonly baseUrl: string;
  readonly rows: number;
  readonly sort: string;
  private readonly fetcher: RecordFetcher;
  private readonly log: LogCallback | null;

  constructor(opts: CheckerOptions = {}) {
    this.bridgeName = opts.bridgeName ?? DEFAULTS.bridgeName;
    this.dataset = opts.dataset ?? DEFAULTS.dataset;
    this.baseUrl = opts.baseUrl ?? DEFAULTS.apiUrl;
    this.rows = opts.rows ?? DEFAULTS.rows;
    this.sort = opts.sort ?? DEFAULTS.sort;
    this.fetcher = new RecordFetcher(this.baseUrl, { timeoutMs: opts.timeoutMs ?? DEFAULTS.timeoutMs });
    this.log = opts.log ?? null;
  }

  /** URL of the latest request, or the bare endpoint before the first one. */
  get sourceUrl(): string {
    return this.fetcher.lastUrl ?? this.baseUrl;
  }

  async getStatus(): Promise<BridgeStatus> {
    const payload = await this.fetcher.fetch({
      dataset: this.dataset,
      q: this.bridgeName,
      rows: this.rows,
      sort: this.sort
    });
    const records = extractRecords(payload);
    const sourceUrl = this.sourceUrl;
    this.log?.("info", { event: "records_fetched", url: sourceUrl, count: records.length });

    const { status, skipped } = interpretRecords(records, sourceUrl);
    if (skipped > 0) {
      this.log?.("warn", { event: "records_skipped", count: skipped });
    }
    this.log?.("info", {
      event: "status_selected",
      is_open: status.is_open,
      observed_at: status.observed_at ? status.observed_at.toISOString() : null
    });
    return status;
  }
}
