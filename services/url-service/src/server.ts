import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createShortIdGenerator } from "./generator.js";
import { createLogger } from "./logger.js";
import { ShortenerService } from "./service.js";
import { selectStore } from "./storage_select.js";

const config = loadConfig();
const logger = createLogger(config.logLevel);

const store = await selectStore(
  { databaseUrl: config.databaseUrl, filePath: config.fileStoragePath },
  logger
);

const service = new ShortenerService({
  store,
  generator: createShortIdGenerator(config.shortIdLength),
  baseUrl: config.baseUrl,
  logger,
  deleteConcurrency: config.deleteConcurrency
});

const buildInfo = {
  service: "url-service",
  version: process.env.APP_VERSION ?? "unknown",
  commit: process.env.GIT_SHA ?? "unknown",
  env: process.env.APP_ENV ?? "unknown",
  started_at: new Date().toISOString()
};

const app = await buildApp({ config, service, logger, buildInfo });

let shuttingDown = false;
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "shutting down");
  try {
    await app.close();
    await service.close();
    process.exit(0);
  } catch (err) {
    logger.error({ err }, "shutdown failed");
    process.exit(1);
  }
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => void shutdown(signal));
}

await app.listen({ port: config.port, host: config.host });
app.log.info(
  { port: config.port, storage: store.kind, baseUrl: config.baseUrl, ...buildInfo },
  "url-service started"
);
