import express from "express";
import { BridgeStatusChecker, type CheckerOptions, type StatusSource } from "../collector/checker.js";
import { renderText, toStatusJson } from "../collector/render.js";
import { config, parsePositiveInt, type StatusConfig } from "../shared/config.js";
import { BridgeStatusError } from "../shared/errors.js";

export type AppDeps = {
  createChecker: (options: CheckerOptions) => StatusSource;
  settings: StatusConfig;
};

const MAX_ROWS = 100;

const parseRows = (value: string | undefined, fallback: number) => Math.min(parsePositiveInt(value, fallback), MAX_ROWS);

const defaultDeps: AppDeps = {
  createChecker: (options) => new BridgeStatusChecker(options),
  settings: config
};

export const createApp = (deps: Partial<AppDeps> = {}) => {
  const { createChecker, settings } = { ...defaultDeps, ...deps };
  const app = express();

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/status", async (req, res) => {
    const { bridge, dataset, rows, format } = req.query;
    const bridgeName = typeof bridge === "string" && bridge ? bridge : settings.bridgeName;

    const checker = createChecker({
      bridgeName,
      dataset: typeof dataset === "string" && dataset ? dataset : settings.dataset,
      baseUrl: settings.apiUrl,
      rows: parseRows(typeof rows === "string" ? rows : undefined, settings.rows),
      sort: settings.sort,
      timeoutMs: settings.timeoutMs
    });

    try {
      const status = await checker.getStatus();
      if (format === "text") {
        res.type("text/plain").send(renderText(status, bridgeName));
      } else {
        res.json(toStatusJson(status));
      }
    } catch (error) {
      if (BridgeStatusError.isBridgeStatusError(error)) {
        console.error(`Status lookup failed for ${bridgeName}:`, error.message);
        res.status(502).json({ error: error.message, reason: error.reason });
        return;
      }
      const message = error instanceof Error ? error.message : "Internal error";
      console.error(`Status lookup crashed for ${bridgeName}:`, message);
      res.status(500).json({ error: message });
    }
  });

  return app;
};
