/**
 * errors.ts - Error taxonomy for healthdesk
 *
 * What this file does:
 * Defines the typed errors that flow between the knowledge base, the
 * completion client, the prompt builder and the agent. The agent catches all
 * of them at its boundary and turns them into `status: "error"` results, so
 * callers above it never see these as exceptions.
 *
 * Which error comes from where:
 * - StoreWriteError: the vector store rejected an insert or delete
 * - StoreQueryError: a search or listing failed
 * - CompletionBackendError: network failure, non-2xx, timeout, or a reply
 *   with no text from the language model
 * - TemplateRenderError: a prompt template references a variable nobody
 *   supplied (a bug in our templates, not bad caller input)
 * - ValidationError: the caller passed structurally invalid input
 * - ConfigError: environment validation failed at startup
 */

export type HealthdeskErrorCode =
  | "STORE_WRITE"
  | "STORE_QUERY"
  | "COMPLETION_BACKEND"
  | "TEMPLATE_RENDER"
  | "VALIDATION"
  | "CONFIG";

/**
 * Base class for every error this project throws on purpose.
 *
 * `code` lets callers (the HTTP layer, the CLI) branch without instanceof
 * chains; `cause` keeps the underlying library error for logs.
 */
export class HealthdeskError extends Error {
  public readonly code: HealthdeskErrorCode;

  constructor(
    code: HealthdeskErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    // Keeps instanceof working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = "HealthdeskError";
    this.code = code;
  }
}

export class StoreWriteError extends HealthdeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_WRITE", message, options);
    this.name = "StoreWriteError";
  }
}

export class StoreQueryError extends HealthdeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_QUERY", message, options);
    this.name = "StoreQueryError";
  }
}

export class CompletionBackendError extends HealthdeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("COMPLETION_BACKEND", message, options);
    this.name = "CompletionBackendError";
  }
}

/**
 * Raised at render time when a template placeholder has no value, or the
 * template file itself cannot be read. Retrying never fixes this.
 */
export class TemplateRenderError extends HealthdeskError {
  public readonly template: string;
  public readonly variable?: string;

  constructor(template: string, message: string, variable?: string) {
    super("TEMPLATE_RENDER", message);
    this.name = "TemplateRenderError";
    this.template = template;
    this.variable = variable;
  }
}

export class ValidationError extends HealthdeskError {
  /** One human-readable line per invalid field */
  public readonly issues: string[];

  constructor(issues: string[]) {
    super("VALIDATION", `Invalid input: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class ConfigError extends HealthdeskError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super("CONFIG", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Extracts a message from anything that was thrown.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
