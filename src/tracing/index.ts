/**
 * tracing/index.ts - OpenTelemetry setup for healthdesk
 *
 * What this file does:
 * Turns on tracing when OTEL_TRACING_ENABLED=true and the optional SDK
 * packages are installed. Each agent operation and each MCP request then
 * becomes a span, with the LangChain/Anthropic calls auto-instrumented by
 * OpenLLMetry nested underneath.
 *
 * Entry points call initTracing() once at startup and flushTracing() before
 * exiting. When tracing is off (the default), or the SDK packages are
 * missing, getTracer() hands out the OTel API's no-op tracer.
 *
 * Environment:
 * - OTEL_TRACING_ENABLED=true: opt in
 * - OTEL_EXPORTER_TYPE: "console" (default) or "otlp"
 * - OTEL_EXPORTER_OTLP_ENDPOINT: collector URL, required for otlp
 * - OTEL_CAPTURE_AI_PAYLOADS=true: record questions and answers on spans.
 *   Health questions are sensitive; leave this off outside development.
 *
 * OpenLLMetry owns the TracerProvider. We hand it our exporter so our own
 * spans and the auto-instrumented LLM spans share one provider and one
 * destination.
 */

import { trace, type Tracer } from "@opentelemetry/api";
import type { SpanExporter } from "@opentelemetry/sdk-trace-node";
import {
  loadTraceloop,
  loadSdkTraceNode,
  loadExporterOtlpProto,
} from "./optional-deps";

export const SERVICE_NAME = "healthdesk";

type TracingLogger = Pick<Console, "log" | "warn">;

/**
 * Whether span attributes may carry user questions and model answers.
 * Read once at load; initTracing() re-reads it from the env it is given.
 */
let captureAiPayloads = process.env.OTEL_CAPTURE_AI_PAYLOADS === "true";

type TraceloopSdk = NonNullable<ReturnType<typeof loadTraceloop>>;

/** The SDK instance tracing was initialized with, if any */
let activeSdk: TraceloopSdk | null = null;

export function isCaptureAiPayloads(): boolean {
  return captureAiPayloads;
}

function createSpanExporter(env: NodeJS.ProcessEnv, logger: TracingLogger): SpanExporter {
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
        "OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_EXPORTER_TYPE=otlp " +
          "(e.g. http://localhost:4318)."
      );
    }
    const base = endpoint.replace(/\/+$/, "");
    const url = base.endsWith("/v1/traces") ? base : `${base}/v1/traces`;
    logger.log(`[OTel] Using OTLP exporter → ${base}`);
    return new exporterOtlpProto.OTLPTraceExporter({ url });
  }

  if (exporterType !== "console") {
    throw new Error(
      `Unsupported OTEL_EXPORTER_TYPE: "${exporterType}". Valid options: "console", "otlp".`
    );
  }

  const sdkTraceNode = loadSdkTraceNode();
  if (!sdkTraceNode) {
    throw new Error(
      "Console exporter requires @opentelemetry/sdk-trace-node. " +
        "Install it: npm install @opentelemetry/sdk-trace-node"
    );
  }
  logger.log("[OTel] Using console exporter");
  return new sdkTraceNode.ConsoleSpanExporter();
}

/**
 * Initializes tracing from the environment.
 *
 * Safe to call more than once; only the first successful call sets up the
 * SDK. Throws when tracing is requested with an exporter configuration
 * that can't work, so a misconfigured deployment fails at startup.
 *
 * @returns true when spans are being exported
 */
export function initTracing(
  env: NodeJS.ProcessEnv = process.env,
  logger: TracingLogger = console
): boolean {
  captureAiPayloads = env.OTEL_CAPTURE_AI_PAYLOADS === "true";
  if (activeSdk) return true;
  if (env.OTEL_TRACING_ENABLED !== "true") return false;

  const traceloop = loadTraceloop();
  if (!traceloop) {
    logger.warn(
      "[OTel] OTEL_TRACING_ENABLED=true but @traceloop/node-server-sdk is not installed. " +
        "Tracing will be no-op."
    );
    return false;
  }

  logger.log("[OTel] Initializing OpenTelemetry tracing...");
  traceloop.initialize({
    appName: SERVICE_NAME,
    exporter: createSpanExporter(env, logger),
    // Export each span as it ends; CLI runs are short-lived
    disableBatch: true,
    traceContent: captureAiPayloads,
    silenceInitializationMessage: true,
  });
  activeSdk = traceloop;
  logger.log(`[OTel] Tracing enabled for ${SERVICE_NAME}`);
  return true;
}

/**
 * Exports any spans still in flight. Entry points call this before exit
 * and on server shutdown; a no-op when tracing never started.
 */
export async function flushTracing(logger: Pick<Console, "error"> = console): Promise<void> {
  if (!activeSdk) return;
  try {
    await activeSdk.forceFlush();
  } catch (error) {
    logger.error("[OTel] Error flushing spans:", error);
  }
}

/**
 * Tracer from the globally registered provider: OpenLLMetry's when tracing
 * is on, the API's no-op otherwise.
 */
export function getTracer(): Tracer {
  return trace.getTracer(SERVICE_NAME);
}
