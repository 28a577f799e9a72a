// Question answering routes
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { MAX_QUERY_LENGTH } from "../config/constants";
import { addEvent } from "../config/otel";
import type { QueryEngine } from "../services/orchestration/coordinator";
import { RequestCancelled } from "../utils/errors";
import { sendError, sendValidationError } from "./errors";

const QueryBodySchema = z.object({
  query: z.string().trim().min(1, "query must not be empty").max(MAX_QUERY_LENGTH),
  page: z.coerce.number().int().optional(),
  pageSize: z.coerce.number().int().optional(),
});

export async function queryRoutes(app: FastifyInstance, engine: QueryEngine) {
  /**
   * Answer a natural-language question.
   * POST /api/query { query, page?, pageSize? }
   */
  app.post("/api/query", async (req, reply) => {
    const parsed = QueryBodySchema.safeParse(req.body);
    if (!parsed.success) return sendValidationError(reply, parsed.error);
    const { query, page, pageSize } = parsed.data;

    // Abort both branches if the client goes away before we answer
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort(new RequestCancelled());
    };
    reply.raw.on("close", onClose);

    addEvent("query.request", { queryLength: query.length });
    try {
      const response = await engine.runQuery(query, page, pageSize, { signal: controller.signal });
      return reply.send(response);
    } catch (error) {
      return sendError(reply, error, req.log);
    } finally {
      reply.raw.off("close", onClose);
    }
  });

  app.get("/api/query/history", async (_req, reply) => {
    return reply.send({ history: engine.getHistory() });
  });
}
