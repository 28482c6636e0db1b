import { config, envInfo } from "../shared/config.js";
import { createApp } from "./app.js";

const start = () => {
  if (!envInfo.envFileExists) {
    console.log(`No ${envInfo.envFile} found; using environment and defaults.`);
  }

  const app = createApp();
  app.listen(config.port, () => {
    console.log(`API listening on http://localhost:${config.port}`);
  });
};

start();
