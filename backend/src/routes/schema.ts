// Connection and schema routes
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { toSchemaView } from "../services/sql/schema_catalog";
import type { QueryEngine } from "../services/orchestration/coordinator";
import { sendError, sendValidationError } from "./errors";

const ConnectBodySchema = z.object({
  connectionString: z.string().trim().min(1, "connectionString must not be empty"),
});

export async function schemaRoutes(app: FastifyInstance, engine: QueryEngine) {
  /**
   * Connect to a store and discover its schema. Replaces any current connection.
   * POST /api/connect-database { connectionString }
   */
  app.post("/api/connect-database", async (req, reply) => {
    const parsed = ConnectBodySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);

    try {
      const catalog = await engine.discoverSchema(parsed.data.connectionString);
      return reply.send({ success: true, schema: toSchemaView(catalog) });
    } catch (error) {
      return sendError(reply, error, req.log);
    }
  });

  app.get("/api/schema", async (_req, reply) => {
    if (!engine.connected) {
      return reply.code(404).send({ error: "NotFound", code: "NOT_CONNECTED", message: "No schema has been discovered yet." });
    }
    return reply.send({ schema: toSchemaView(engine.getSchema()) });
  });
}
