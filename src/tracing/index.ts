/**
 * tracing/index.ts - OpenTelemetry setup for rag-datacore
 *
 * What this file does:
 * Gives the embedding providers and the collection service a tracer for
 * spans around embed batches, adds and queries, so slow provider calls and
 * index operations show up in whatever OTel backend the host uses.
 *
 * Opt-in:
 * Tracing is disabled unless OTEL_TRACING_ENABLED=true. When disabled, the
 * OTel API returns a no-op tracer and withSpan() costs one function call.
 *
 * Graceful degradation:
 * The SDK packages (@opentelemetry/sdk-trace-node and, for OTLP,
 * @opentelemetry/exporter-trace-otlp-proto) are optional dependencies
 * loaded through optional-deps.ts. When absent, initialization is skipped
 * with a warning and spans fall through to the API's no-ops.
 *
 * Exporter options (OTEL_EXPORTER_TYPE):
 * - console (default): prints spans to stdout
 * - otlp: sends spans to OTEL_EXPORTER_OTLP_ENDPOINT
 */

import {
  SpanKind,
  SpanStatusCode,
  context,
  trace,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import { loadExporterOtlpProto, loadSdkTraceNode } from "./optional-deps";

const SERVICE_NAME = "rag-datacore";

let initialized = false;

/**
 * Create the span exporter named by OTEL_EXPORTER_TYPE.
 *
 * @throws Error if the exporter type is unknown, its package is missing,
 *   or OTLP is selected without an endpoint
 */
function createSpanExporter(
  env: NodeJS.ProcessEnv,
  sdkTraceNode: typeof import("@opentelemetry/sdk-trace-node")
): SpanExporter {
  const exporterType = env.OTEL_EXPORTER_TYPE || "console";

  if (exporterType === "otlp") {
    const exporterOtlpProto = loadExporterOtlpProto();
    if (!exporterOtlpProto) {
      throw new Error(
        "OTEL_EXPORTER_TYPE=otlp requires @opentelemetry/exporter-trace-otlp-proto. " +
          "Install it: npm install @opentelemetry/exporter-trace-otlp-proto"
      );
    }
    const endpoint = env.OTEL_EXPORTER_OTLP_ENDPOINT;
    if (!endpoint) {
      throw new Error(
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp."
      );
    }
    // Strip trailing slashes to avoid a double slash before /v1/traces
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Register a global TracerProvider when OTEL_TRACING_ENABLED=true.
 *
 * Safe to call more than once; only the first call does anything.
 *
 * @returns true when a provider was registered by this call
 */
export function initializeTracing(env: NodeJS.ProcessEnv = process.env): boolean {
  if (initialized || env.OTEL_TRACING_ENABLED !== "true") return false;
  initialized = true;

  const sdkTraceNode = loadSdkTraceNode();
  if (!sdkTraceNode) {
    console.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @opentelemetry/sdk-trace-node is not installed. " +
        "Tracing will be no-op."
    );
    return false;
  }

  const exporter = createSpanExporter(env, sdkTraceNode);
  const provider = new sdkTraceNode.NodeTracerProvider({
    spanProcessors: [new sdkTraceNode.SimpleSpanProcessor(exporter)],
  });
  provider.register();

  const shutdown = async () => {
    try {
      await provider.shutdown();
    } catch (error) {
      console.error("[OTel] Error shutting down tracing:", error);
    }
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);

  return true;
}

/**
 * Tracer from the global provider, or the API's no-op tracer when tracing
 * was never initialized.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}

/**
 * Runs `fn` inside an INTERNAL span named `name`.
 *
 * Thrown errors are recorded on the span, its status set to ERROR, and
 * rethrown. The span is active for everything `fn` awaits, so provider
 * SDK spans nest under it.
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>
): Promise<T> {
  const span = getTracer().startSpan(name, {
    kind: SpanKind.INTERNAL,
    attributes,
  });
  const activeContext = trace.setSpan(context.active(), span);

  return context.with(activeContext, async () => {
    try {
      const result = await fn(span);
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error) {
      const recorded = error instanceof Error ? error : new Error(String(error));
      span.recordException(recorded);
      span.setStatus({ code: SpanStatusCode.ERROR, message: recorded.message });
      throw error;
    } finally {
      span.end();
    }
  });
}
