import { loggerFactory } from "@liftwise/logger";

import { loadDemoConfig } from "./config.mjs";
import { runDemo } from "./demo.mjs";

const config = loadDemoConfig(process.env);
const { logger } = loggerFactory({
  name: "liftwise-demo",
  level: config.logLevel,
  pretty: config.logPretty,
});

runDemo(logger);
