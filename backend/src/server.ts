/* Backend server entry point */
import { stopTracing } from "./config/otel"; // Bootstrap OpenTelemetry before loading instrumented modules
import Fastify from "fastify";
import cors from "@fastify/cors";
import { fileURLToPath } from "node:url";
import { env } from "./config/env";
import { DATABASE_URL, DOCUMENTS_DATABASE_URL, LOG_LEVEL, PROJECT_NAME } from "./config/constants";
import { requestCounter } from "./config/metrics";
import { healthRoutes } from "./routes/health";
import { queryRoutes } from "./routes/query";
import { schemaRoutes } from "./routes/schema";
import { createDocumentSearch } from "./services/documents";
import { QueryEngine } from "./services/orchestration/coordinator";
import { logger } from "./utils/logger";
import { toError } from "./utils/errors";

export interface BuildOptions {
  engine?: QueryEngine;
}

export async function build(options: BuildOptions = {}) {
  const engine = options.engine ?? new QueryEngine({ documents: createDocumentSearch(DOCUMENTS_DATABASE_URL) });
  const app = Fastify({ logger: { level: LOG_LEVEL, name: PROJECT_NAME } });

  await app.register(cors, { origin: env.CORS_ORIGIN, credentials: true });

  app.addHook("onResponse", async (req, reply) => {
    requestCounter.labels(req.routeOptions.url ?? "unmatched", String(reply.statusCode)).inc();
  });

  await healthRoutes(app, engine);
  await schemaRoutes(app, engine);
  await queryRoutes(app, engine);

  app.addHook("onClose", async () => {
    await engine.close();
  });

  return { app, engine };
}

async function start() {
  const { app, engine } = await build();

  if (DATABASE_URL) {
    try {
      const catalog = await engine.discoverSchema(DATABASE_URL);
      logger.info({ tables: catalog.tables.length }, "connected to DATABASE_URL at startup");
    } catch (err) {
      logger.warn({ err: toError(err).message }, "could not connect to DATABASE_URL at startup");
    }
  }

  await app.listen({ port: env.PORT, host: "0.0.0.0" });
  app.log.info(`Backend listening on http://localhost:${env.PORT}`);

  const shutdown = () => {
    app
      .close()
      .then(() => stopTracing())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err: toError(err).message }, "shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

// Start server if run directly (not imported)
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  start().catch((err: unknown) => {
    logger.fatal({ err: toError(err).message }, "server failed to start");
    process.exit(1);
  });
}
