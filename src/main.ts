#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { run } from "./mcpServer.js";
import { InMemorySessionStore } from "./sessionEngine.js";
import { demoSurveys } from "./surveys/demoSurveys.js";

const config = loadConfig();
const log = createLogger(config.serverName, { level: config.logLevel, pretty: config.logPretty });

const store = new InMemorySessionStore();
for (const survey of demoSurveys) {
  store.registerSurvey(survey);
  log.debug({ surveyId: survey.id }, "Registered survey");
}

run({ store, config, logger: log })
  .then(() => log.info({ name: config.serverName, version: config.serverVersion }, "Survey server listening on stdio"))
  .catch((err: unknown) => {
    log.fatal({ err }, "Survey server failed to start");
    process.exit(1);
  });
