// Observability: tracing
import { context, SpanStatusCode, trace, type Attributes } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { SemanticResourceAttributes } from "@opentelemetry/semantic-conventions";
import { isEngineError } from "../utils/errors";
import { logger } from "../utils/logger";
import { PROJECT_NAME } from "./constants";
import { env } from "./env";

/**
 * Starts the NodeSDK when ENABLE_OTEL=true. Runs on import so the pg, mysql2 and
 * http patches land before those modules load; the server entry imports this first.
 */
function startTracing(): NodeSDK | null {
  if (!env.ENABLE_OTEL) return null;
  const serviceName = env.OTEL_SERVICE_NAME || PROJECT_NAME;
  const sdk = new NodeSDK({
    resource: new Resource({ [SemanticResourceAttributes.SERVICE_NAME]: serviceName }),
    traceExporter: new OTLPTraceExporter({ url: env.OTEL_EXPORTER_OTLP_ENDPOINT }),
    // fs spans would drown out the lexicon and hint-rule reads
    instrumentations: [getNodeAutoInstrumentations({ "@opentelemetry/instrumentation-fs": { enabled: false } })],
  });
  try {
    sdk.start();
    logger.info({ serviceName, endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT }, "tracing started");
  } catch (err) {
    logger.error({ err }, "tracing failed to start");
    return null;
  }
  return sdk;
}

const sdk = startTracing();

/** Flushes pending spans. Safe to call when tracing is off. */
export async function stopTracing(): Promise<void> {
  if (!sdk) return;
  await sdk.shutdown().catch((err: unknown) => logger.error({ err }, "tracing shutdown failed"));
}

export const tracer = trace.getTracer(PROJECT_NAME);

export type SpanAttributes = Record<string, string | number | boolean | undefined>;

/** Span attributes for a failure; engine errors carry their stable code. */
export function errorAttributes(error: unknown): Attributes {
  return isEngineError(error) ? { error: true, "engine.error_code": error.code } : { error: true };
}

export async function withSpan<T>(name: string, fn: () => Promise<T> | T, attrs?: SpanAttributes): Promise<T> {
  return await tracer.startActiveSpan(name, async (span) => {
    for (const [k, v] of Object.entries(attrs ?? {})) {
      if (v !== undefined) span.setAttribute(k, v);
    }
    try {
      return await fn();
    } catch (e) {
      span.recordException(e instanceof Error ? e : String(e));
      span.setAttributes(errorAttributes(e));
      span.setStatus({ code: SpanStatusCode.ERROR, message: e instanceof Error ? e.message : String(e) });
      throw e;
    } finally {
      span.end();
    }
  });
}

export function addEvent(name: string, attrs?: Attributes) {
  trace.getSpan(context.active())?.addEvent(name, attrs);
}
