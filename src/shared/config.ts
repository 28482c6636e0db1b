import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const isProdEnv = process.env.BRUGSTATUS_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

export const DEFAULTS = {
  bridgeName: "Hogebrug",
  dataset: "brugopeningen",
  apiUrl: "https://rotterdam.dataplatform.nl/api/records/1.0/search/",
  rows: 5,
  sort: "-record_timestamp",
  timeoutMs: 10_000,
  port: 3000
} as const;

export type StatusConfig = {
  bridgeName: string;
  dataset: string;
  apiUrl: string;
  rows: number;
  sort: string;
  timeoutMs: number;
  port: number;
};

export const parsePositiveInt = (value: string | undefined, fallback: number) => {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): StatusConfig => ({
  bridgeName: env.BRUG_NAME || DEFAULTS.bridgeName,
  dataset: env.BRUG_DATASET || DEFAULTS.dataset,
  apiUrl: env.BRUG_API_URL || DEFAULTS.apiUrl,
  rows: parsePositiveInt(env.BRUG_ROWS, DEFAULTS.rows),
  sort: env.BRUG_SORT || DEFAULTS.sort,
  timeoutMs: parsePositiveInt(env.BRUG_TIMEOUT_MS, DEFAULTS.timeoutMs),
  port: parsePositiveInt(env.PORT, DEFAULTS.port)
});

export const config = loadConfig();
