import "dotenv/config";
import pkg from "@slack/bolt";
import { connectPlatform } from "../connect.js";
import { DEFAULT_SETTINGS_PATH, readSettingsFile } from "../core/config.js";
import { RunStore } from "../core/runStore.js";
import { createLogger } from "../logger.js";
import { registerHandlers } from "./handlers.js";

const { App } = pkg;

const logger = createLogger();

export const app = new App({
  logger,
  token: process.env.SLACK_BOT_TOKEN,
  signingSecret: process.env.SLACK_SIGNING_SECRET,
  socketMode: true,
  appToken: process.env.SLACK_APP_TOKEN,
});

registerHandlers(app, {
  store: new RunStore(),
  loadSettings: () => readSettingsFile(process.env.SWEEP_CONFIG ?? DEFAULT_SETTINGS_PATH),
  connect: connectPlatform,
});

await app.start();
logger.info("repo-sweep Slack app is running");
