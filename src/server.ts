import "dotenv/config";
import { node } from "@elysiajs/node";
import { Elysia } from "elysia";
import { type AppConfig, loadConfig } from "src/config.ts";
import { createAuthorization } from "src/core/authorization.ts";
import { createApp } from "src/http/app.ts";
import { createLogger } from "src/logger.ts";
import {
  createOpenFgaClient,
  OpenFgaOracle,
} from "src/oracle/openfga/adapter.ts";
import type { EntityStore } from "src/store/interface.ts";
import { KyselyEntityStore } from "src/store/kysely/adapter.ts";
import { createDb } from "src/store/kysely/db.ts";
import { MemoryEntityStore } from "src/store/memory/adapter.ts";

function createStore(config: AppConfig): EntityStore {
  return config.store.driver === "postgres"
    ? new KyselyEntityStore(createDb(config.store.postgres))
    : new MemoryEntityStore();
}

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

const store = createStore(config);
const authorization = createAuthorization(
  new OpenFgaOracle(createOpenFgaClient(config.fga)),
  { timeoutMs: config.fga.timeoutMs, logger },
);

logger.info(
  {
    version: config.version,
    store: config.store.driver,
    fgaApiUrl: config.fga.apiUrl,
  },
  `Starting ${config.title}`,
);
if (await authorization.health()) {
  logger.info("Relationship store reachable");
} else {
  logger.warn("Relationship store unreachable; checks will deny until it is");
}

const app = new Elysia({ adapter: node() })
  .use(
    createApp({
      store,
      authorization,
      logger,
      info: { title: config.title, version: config.version },
      corsOrigin: config.corsOrigin,
    }),
  )
  .listen(config.port, () => {
    logger.info({ port: config.port }, "Listening");
  });

async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, "Shutting down");
  try {
    await app.stop();
    await store.destroy();
  } catch (error) {
    logger.error({ err: error }, "Shutdown failed");
    process.exitCode = 1;
  }
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.once(signal, () => {
    void shutdown(signal);
  });
}
