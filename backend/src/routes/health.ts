// Health and metrics routes
import type { FastifyInstance } from "fastify";
import { getMetrics, getMetricsContentType } from "../config/metrics";
import type { QueryEngine } from "../services/orchestration/coordinator";

export async function healthRoutes(app: FastifyInstance, engine: QueryEngine) {
  /**
   * GET /api/health
   */
  app.get("/api/health", async (_req, reply) => {
    const schema = engine.connected ? engine.getSchema() : null;
    reply.send({
      status: "healthy",
      timestamp: new Date().toISOString(),
      connected: schema !== null,
      dialect: schema?.dialect ?? null,
      tables: schema?.tables.length ?? 0,
      cache: engine.cacheStats(),
    });
  });

  app.get("/metrics", async (_req, reply) => {
    reply.header("Content-Type", getMetricsContentType());
    reply.send(await getMetrics());
  });
}
