export { BridgeStatusChecker } from "./collector/checker.js";
export type { CheckerOptions, LogCallback, StatusSource } from "./collector/checker.js";
export { RecordFetcher, extractRecords } from "./collector/fetcher.js";
export type { SearchQuery } from "./collector/fetcher.js";
export { interpret, interpretRecords, recordToStatus, STATUS_RULES } from "./collector/interpreter.js";
export type { Interpretation, StatusInference, StatusRule } from "./collector/interpreter.js";
export { renderJson, renderText, statusLabel, toJsonSafe, toStatusJson } from "./collector/render.js";
export { parseDateTime } from "./shared/datetime.js";
export { parseOrderedJson } from "./shared/json.js";
export { BridgeStatusError, FetchError, InterpretationError } from "./shared/errors.js";
export type { LookupFailureReason } from "./shared/errors.js";
export type { BridgeStatus, FieldSet, JsonValue, SourceRecord, StatusJson } from "./shared/record.js";
export { createApp } from "./server/app.js";
