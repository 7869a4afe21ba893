import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";
import { createApp, findPublicDir } from "./app.js";
import { findEnvPath } from "./config/env.js";
import { loadSettings, type Settings } from "./config/settings.js";
import { describeError } from "./errors.js";
import { ConsoleLogger } from "./lib/logger.js";
import { createServices } from "./services.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

dotenv.config({ path: findEnvPath(__dirname) });

function main(): void {
  const bootLogger = new ConsoleLogger();
  let settings: Settings;
  try {
    settings = loadSettings();
  } catch (err) {
    bootLogger.error(`Startup failed: ${describeError(err)}`);
    process.exit(1);
  }

  const logger = new ConsoleLogger({ level: settings.logLevel });
  const services = createServices(settings, logger);
  const publicDir = findPublicDir(__dirname);
  if (!publicDir) logger.warn("public/index.html not found; the chat UI will not be served");

  const app = createApp({
    chat: services.chat,
    logger,
    service: settings.serviceName,
    version: settings.version,
    maxMessageLength: settings.maxMessageLength,
    publicDir,
  });

  app.listen(settings.port, () => {
    logger.info(`${settings.serviceName} listening at http://localhost:${settings.port}`, {
      vectorStore: settings.vectorStore,
      chatModel: settings.chatModel,
      embeddingModel: settings.embeddingModel,
    });
  });
}

main();
