import { BridgeStatusChecker, type CheckerOptions, type LogCallback, type StatusSource } from "../collector/checker.js";
import { renderJson, renderText } from "../collector/render.js";
import { config, type StatusConfig } from "../shared/config.js";
import { BridgeStatusError } from "../shared/errors.js";

export type CliOptions = {
  bridge: string;
  dataset: string;
  rows: number;
  url: string;
  sort: string;
  timeoutMs: number;
  json: boolean;
  verbose: boolean;
  help: boolean;
};

export type CliDeps = {
  createChecker: (options: CheckerOptions) => StatusSource;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  defaults: StatusConfig;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

export const USAGE = `Gebruik: brugstatus [opties]

Controleer de actuele status van een brug via het open data portaal.

  --bridge <naam>      Naam van de brug (standaard: Hogebrug)
  --dataset <id>       Dataset-id op het open data portaal
  --rows <aantal>      Aantal records dat opgehaald wordt
  --url <endpoint>     API-endpoint van het open data portaal
  --sort <veld>        Sortering van de zoekopdracht
  --timeout-ms <ms>    Time-out van het verzoek in milliseconden
  --json               Toon het resultaat als JSON in plaats van tekst
  --verbose            Schrijf diagnostische regels naar stderr
  --help               Toon deze hulp`;

const VALUE_FLAGS = new Set(["bridge", "dataset", "rows", "url", "sort", "timeout-ms"]);
const BOOLEAN_FLAGS = new Set(["json", "verbose", "help"]);

const parsePositive = (flag: string, value: string) => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new CliUsageError(`Ongeldige waarde voor --${flag}: ${value}`);
  }
  return parsed;
};

export const parseArgs = (argv: string[], defaults: StatusConfig = config): CliOptions => {
  const args = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg.startsWith("--")) {
      throw new CliUsageError(`Onbekend argument: ${arg}`);
    }
    const eq = arg.indexOf("=");
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (BOOLEAN_FLAGS.has(key)) {
      if (eq !== -1) {
        throw new CliUsageError(`Optie --${key} neemt geen waarde`);
      }
      switches.add(key);
      continue;
    }
    if (!VALUE_FLAGS.has(key)) {
      throw new CliUsageError(`Onbekende optie: --${key}`);
    }
    if (eq !== -1) {
      args.set(key, arg.slice(eq + 1));
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      throw new CliUsageError(`Optie --${key} verwacht een waarde`);
    }
    args.set(key, next);
    i += 1;
  }

  const rows = args.get("rows");
  const timeoutMs = args.get("timeout-ms");

  return {
    bridge: args.get("bridge") || defaults.bridgeName,
    dataset: args.get("dataset") || defaults.dataset,
    rows: rows === undefined ? defaults.rows : parsePositive("rows", rows),
    url: args.get("url") || defaults.apiUrl,
    sort: args.get("sort") || defaults.sort,
    timeoutMs: timeoutMs === undefined ? defaults.timeoutMs : parsePositive("timeout-ms", timeoutMs),
    json: switches.has("json"),
    verbose: switches.has("verbose"),
    help: switches.has("help")
  };
};

const defaultDeps: CliDeps = {
  createChecker: (options) => new BridgeStatusChecker(options),
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  defaults: config
};

/** Runs one lookup and returns the process exit code. */
export const main = async (argv: string[], deps: Partial<CliDeps> = {}): Promise<number> => {
  const { createChecker, stdout, stderr, defaults } = { ...defaultDeps, ...deps };

  let options: CliOptions;
  try {
    options = parseArgs(argv, defaults);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr(error.message);
      stderr(USAGE);
      return 2;
    }
    throw error;
  }

  if (options.help) {
    stdout(USAGE);
    return 0;
  }

  const log: LogCallback | undefined = options.verbose
    ? (level, data) => stderr(JSON.stringify({ level, timestamp: new Date().toISOString(), ...data }))
    : undefined;

  const checker = createChecker({
    bridgeName: options.bridge,
    dataset: options.dataset,
    baseUrl: options.url,
    rows: options.rows,
    sort: options.sort,
    timeoutMs: options.timeoutMs,
    log
  });

  try {
    const status = await checker.getStatus();
    stdout(options.json ? renderJson(status) : renderText(status, options.bridge));
    return 0;
  } catch (error) {
    if (BridgeStatusError.isBridgeStatusError(error)) {
      stderr(`Kon de brugstatus niet bepalen: ${error.message}`);
      return 1;
    }
    throw error;
  }
};
