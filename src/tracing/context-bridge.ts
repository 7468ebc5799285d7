/**
 * context-bridge.ts - Root spans for agent operations and MCP requests
 *
 * What this file does:
 * Opens one root span per agent operation (`healthdesk.<operation>`) or MCP
 * tool call (`healthdesk.mcp.<tool>`), keeps it in AsyncLocalStorage while
 * the work runs, and closes it with a status that reflects the result.
 *
 * Agent operations and MCP tools report failure in their return value
 * (`status: "error"`, `isError: true`) rather than by throwing, so the span
 * status is taken from the result as well as from thrown exceptions.
 *
 * Span hierarchy for an MCP call:
 *   healthdesk.mcp.ask_health_question
 *   └── healthdesk.processQuery
 *       └── anthropic.chat (auto-instrumented)
 */

import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";
import {
  context,
  trace,
  type Span,
  SpanKind,
  SpanStatusCode,
} from "@opentelemetry/api";
import { getTracer, isCaptureAiPayloads, SERVICE_NAME } from "./index";

/**
 * MCP tool result: a content array plus an optional error flag.
 * The index signature matches the MCP SDK's CallToolResult.
 */
export interface McpToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

/** The innermost root span, for attaching the final output */
const rootSpanStorage = new AsyncLocalStorage<Span>();

/**
 * Records the final answer on the current root span.
 * Only when OTEL_CAPTURE_AI_PAYLOADS=true.
 */
export function setTraceOutput(output: string): void {
  const span = rootSpanStorage.getStore();
  if (span && isCaptureAiPayloads()) {
    span.setAttribute("traceloop.entity.output", output);
  }
}

function recordException(span: Span, error: unknown): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: error instanceof Error ? error.message : String(error),
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
}

/**
 * Runs one agent operation inside a `healthdesk.<operation>` span.
 *
 * @param operation - Agent method name, e.g. "processQuery"
 * @param input - Human-readable input, recorded only when payload capture is on
 */
export async function withOperationTracing<T extends { status: string }>(
  operation: string,
  input: string,
  fn: () => Promise<T>
): Promise<T> {
  const attributes: Record<string, string> = {
    [`${SERVICE_NAME}.operation`]: operation,
    "traceloop.span.kind": "workflow",
    "traceloop.entity.name": operation,
  };
  if (isCaptureAiPayloads() && input) {
    attributes["traceloop.entity.input"] = input;
  }

  return getTracer().startActiveSpan(
    `${SERVICE_NAME}.${operation}`,
    { kind: SpanKind.INTERNAL, attributes },
    async (span: Span) => {
      try {
        const result = await rootSpanStorage.run(span, fn);
        if (result.status === "error") {
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message:
              "error" in result && typeof result.error === "string"
                ? result.error
                : `${operation} failed`,
          });
        } else {
          span.setStatus({ code: SpanStatusCode.OK });
        }
        return result;
      } catch (error) {
        recordException(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}

/**
 * Runs one MCP tool call inside a `healthdesk.mcp.<tool>` span, with the
 * GenAI tool-execution attributes LLM observability backends look for.
 */
export async function withMcpRequestTracing(
  toolName: string,
  input: Record<string, unknown>,
  fn: () => Promise<McpToolResult>
): Promise<McpToolResult> {
  const attributes: Record<string, string> = {
    [`${SERVICE_NAME}.mcp.tool.name`]: toolName,
    "traceloop.span.kind": "workflow",
    "traceloop.entity.name": toolName,
    // https://opentelemetry.io/docs/specs/semconv/gen-ai/gen-ai-spans/
    "gen_ai.operation.name": "execute_tool",
    "gen_ai.tool.name": toolName,
    "gen_ai.tool.type": "function",
    "gen_ai.tool.call.id": randomUUID(),
  };
  if (isCaptureAiPayloads()) {
    attributes["traceloop.entity.input"] = JSON.stringify(input);
  }

  return getTracer().startActiveSpan(
    `${SERVICE_NAME}.mcp.${toolName}`,
    { kind: SpanKind.INTERNAL, attributes },
    async (span: Span) => {
      try {
        const result = await context.with(trace.setSpan(context.active(), span), () =>
          rootSpanStorage.run(span, fn)
        );

        const text = result.content.map((c) => c.text).join("\n");
        if (result.isError) {
          span.setStatus({
            code: SpanStatusCode.ERROR,
            message: text || "MCP tool returned error",
          });
        } else {
          span.setStatus({ code: SpanStatusCode.OK });
        }
        if (isCaptureAiPayloads() && text) {
          span.setAttribute("traceloop.entity.output", text);
        }
        return result;
      } catch (error) {
        recordException(span, error);
        throw error;
      } finally {
        span.end();
      }
    }
  );
}
