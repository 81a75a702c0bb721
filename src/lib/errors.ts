export type WorkflowErrorKind =
  | "generation"
  | "publish"
  | "secret"
  | "platform"
  | "ledger"
  | "auxiliary"
  | "precondition";

export abstract class WorkflowError extends Error {
  abstract readonly kind: WorkflowErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.details = details;
  }
}

/** The completion call failed or its reply carried no usable code block. */
export class GenerationError extends WorkflowError {
  readonly kind = "generation" as const;
}

/** Repository creation or a file commit failed. Earlier commits stay in place. */
export class PublishError extends WorkflowError {
  readonly kind = "publish" as const;
}

export class SecretError extends WorkflowError {
  readonly kind = "secret" as const;
}

export class PlatformError extends WorkflowError {
  readonly kind = "platform" as const;
}

export class LedgerError extends WorkflowError {
  readonly kind = "ledger" as const;
}

export class AuxiliaryError extends WorkflowError {
  readonly kind = "auxiliary" as const;
}

/** A dependent action ran before the state it needs existed. */
export class PreconditionError extends WorkflowError {
  readonly kind = "precondition" as const;
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: WorkflowError };

export function succeed<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: WorkflowError): StepResult<T> {
  return { ok: false, error };
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}

/**
 * Runs `run` and converts a thrown error into a failed result. Errors that are
 * not already workflow errors are wrapped with `wrap` so callers only ever see
 * the closed set of kinds.
 */
export async function capture<T>(
  run: () => Promise<T>,
  wrap: (message: string, cause: unknown) => WorkflowError
): Promise<StepResult<T>> {
  try {
    return succeed(await run());
  } catch (error) {
    if (isWorkflowError(error)) {
      return fail(error);
    }
    const message = error instanceof Error ? error.message : String(error);
    return fail(wrap(message, error));
  }
}
