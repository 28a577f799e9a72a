// Document branch: free-text search over the documents/chunks corpus.
import pg from "pg";
import type { DocumentHit } from "../../../shared/types";
import { withSpan } from "../config/otel";
import { IndexUnavailable } from "../utils/errors";
import { logger } from "../utils/logger";

export interface DocumentSearchOptions {
  signal?: AbortSignal;
}

/** Anything that can rank document passages against free text. */
export interface DocumentSearch {
  search(query: string, limit: number, options?: DocumentSearchOptions): Promise<DocumentHit[]>;
  close?(): Promise<void>;
}

// Codes meaning the corpus cannot be searched at all, as opposed to a bad query.
const UNAVAILABLE_CODES = new Set(["42P01", "42883", "3D000", "28P01", "ECONNREFUSED", "ENOTFOUND", "ETIMEDOUT"]);

export function buildChunkSearchSQL(k: number) {
  const limit = Math.max(1, Math.floor(k));
  return `
    SELECT c.document_id, c.chunk_index, c.content, d.title, d.source,
           word_similarity($1, c.content) AS score
    FROM chunks c
    JOIN documents d ON c.document_id = d.id
    WHERE $1 <% c.content
    ORDER BY score DESC, c.document_id, c.chunk_index
    LIMIT ${limit}
  `;
}

type ChunkRow = {
  document_id: unknown;
  chunk_index: unknown;
  content: unknown;
  title: unknown;
  source: unknown;
  score: unknown;
};

export function toDocumentHit(row: ChunkRow): DocumentHit {
  const score = typeof row.score === "number" ? row.score : Number(row.score);
  return {
    text: typeof row.content === "string" ? row.content : String(row.content ?? ""),
    score: Number.isFinite(score) ? Math.round(score * 1000) / 1000 : null,
    metadata: {
      documentId: row.document_id,
      chunkIndex: row.chunk_index,
      title: row.title ?? null,
      source: row.source ?? null,
    },
  };
}

export class PgDocumentSearch implements DocumentSearch {
  constructor(private readonly pool: pg.Pool) {}

  async search(query: string, limit: number, options: DocumentSearchOptions = {}): Promise<DocumentHit[]> {
    return await withSpan(
      "documents.search",
      async () => {
        options.signal?.throwIfAborted();
        try {
          const { rows } = await this.pool.query<ChunkRow>(buildChunkSearchSQL(limit), [query]);
          return rows.map(toDocumentHit);
        } catch (err) {
          const code = typeof err === "object" && err !== null && "code" in err ? String(err.code) : "";
          if (UNAVAILABLE_CODES.has(code)) {
            throw new IndexUnavailable(`Document index is unavailable (${code})`, { cause: err });
          }
          throw err;
        }
      },
      { k: limit, queryLength: query.length }
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function createDocumentSearch(connectionString: string): DocumentSearch | null {
  if (!connectionString) {
    logger.info("no document index configured; document questions return no passages");
    return null;
  }
  const pool = new pg.Pool({ connectionString, idleTimeoutMillis: 5_000, max: 5 });
  pool.on("error", (err) => logger.warn({ err: err.message }, "document index pool error"));
  return new PgDocumentSearch(pool);
}
