#!/usr/bin/env node
import { main } from "./main.js";

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("brugstatus failed:", err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
