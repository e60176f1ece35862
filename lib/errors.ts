/**
 * Error taxonomy for the tool router.
 *
 * - ConfigError / RegistryLoadError: startup-fatal, the server refuses to start
 * - ClassificationError: request-local, recovered by forcing the fallback branch
 * - ToolExecutionError: request-local, recovered inside the tool executor
 * - PreconditionError: an internal invariant was broken (router/driver bug)
 */

export type OrchestratorErrorCode =
  | "CONFIG_INVALID"
  | "REGISTRY_LOAD_FAILED"
  | "CLASSIFICATION_FAILED"
  | "TOOL_EXECUTION_FAILED"
  | "PRECONDITION_FAILED"
  | "DEADLINE_EXCEEDED";

export class OrchestratorError extends Error {
  public readonly code: OrchestratorErrorCode;

  constructor(code: OrchestratorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "OrchestratorError";
    this.code = code;
  }
}

export class ConfigError extends OrchestratorError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export class RegistryLoadError extends OrchestratorError {
  /** File path or label of the registry document */
  public readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("REGISTRY_LOAD_FAILED", `${message} (source: ${source})`, options);
    this.name = "RegistryLoadError";
    this.source = source;
  }
}

export type ClassificationFailureReason = "model_error" | "timeout" | "aborted" | "invalid_output";

export class ClassificationError extends OrchestratorError {
  public readonly reason: ClassificationFailureReason;

  constructor(reason: ClassificationFailureReason, message: string, options?: { cause?: unknown }) {
    super("CLASSIFICATION_FAILED", message, options);
    this.name = "ClassificationError";
    this.reason = reason;
  }
}

export class ToolExecutionError extends OrchestratorError {
  public readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super("TOOL_EXECUTION_FAILED", message, options);
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class PreconditionError extends OrchestratorError {
  constructor(message: string) {
    super("PRECONDITION_FAILED", message);
    this.name = "PreconditionError";
  }
}

export type DeadlineReason = "timeout" | "aborted";

export class DeadlineExceededError extends OrchestratorError {
  public readonly reason: DeadlineReason;
  public readonly timeoutMs: number;

  constructor(reason: DeadlineReason, timeoutMs: number) {
    super(
      "DEADLINE_EXCEEDED",
      reason === "timeout" ? `Timed out after ${timeoutMs}ms` : "Request was cancelled"
    );
    this.name = "DeadlineExceededError";
    this.reason = reason;
    this.timeoutMs = timeoutMs;
  }
}

export function isOrchestratorError(err: unknown): err is OrchestratorError {
  return err instanceof OrchestratorError;
}

/**
 * Short, single-line diagnostic for any thrown value
 */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name;
  }
  if (typeof err === "string") {
    return err;
  }
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
