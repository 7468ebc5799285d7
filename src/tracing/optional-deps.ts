/**
 * optional-deps.ts - Runtime lookup of the tracing SDK packages
 *
 * healthdesk lists the OpenTelemetry SDK and OpenLLMetry as
 * optionalDependencies. When one is not installed its loader returns null
 * and tracing/index.ts leaves the no-op tracer in place. A package that is
 * installed but fails to load still throws.
 *
 * Tests replace this module with vi.mock("./optional-deps").
 */

type TraceloopSdk = typeof import("@traceloop/node-server-sdk");
type SdkTraceNode = typeof import("@opentelemetry/sdk-trace-node");
type ExporterOtlpProto = typeof import("@opentelemetry/exporter-trace-otlp-proto");

function requireIfInstalled<T>(packageName: string): T | null {
  try {
    return require(packageName);
  } catch (error) {
    const missing =
      error instanceof Error &&
      "code" in error &&
      error.code === "MODULE_NOT_FOUND" &&
      error.message.includes(packageName);
    if (missing) return null;
    throw error;
  }
}

export function loadTraceloop(): TraceloopSdk | null {
  return requireIfInstalled<TraceloopSdk>("@traceloop/node-server-sdk");
}

/** ConsoleSpanExporter for OTEL_EXPORTER_TYPE=console */
export function loadSdkTraceNode(): SdkTraceNode | null {
  return requireIfInstalled<SdkTraceNode>("@opentelemetry/sdk-trace-node");
}

/** OTLPTraceExporter for OTEL_EXPORTER_TYPE=otlp */
export function loadExporterOtlpProto(): ExporterOtlpProto | null {
  return requireIfInstalled<ExporterOtlpProto>("@opentelemetry/exporter-trace-otlp-proto");
}
