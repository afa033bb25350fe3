import { DocumentField } from '../types';

/**
 * Base class for every error this package throws.
 */
export class Req2CodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A template referenced a context key that was not supplied.
 * Indicates a wiring bug in the graph, never retried.
 */
export class MissingContextError extends Req2CodeError {
  readonly templateId: string;
  readonly missingKeys: string[];

  constructor(templateId: string, missingKeys: string[]) {
    super(`Template "${templateId}" is missing context: ${missingKeys.join(', ')}`);
    this.templateId = templateId;
    this.missingKeys = missingKeys;
  }
}

export type TransientReason = 'timeout' | 'network' | 'rate_limited' | 'provider_5xx' | 'aborted';

/**
 * Recoverable model call failure. Callers may retry the same node.
 */
export class TransientCallError extends Req2CodeError {
  readonly reason: TransientReason;
  readonly status: number | undefined;

  constructor(message: string, reason: TransientReason, status?: number, options?: { cause?: unknown }) {
    super(message);
    this.reason = reason;
    this.status = status;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The review loop did not converge. Recorded as a warning, not thrown out of a run.
 */
export class MaxIterationsExceeded extends Req2CodeError {
  readonly maxIterations: number;

  constructor(maxIterations: number) {
    super(`Code was not approved within ${maxIterations} review iteration(s)`);
    this.maxIterations = maxIterations;
  }
}

/**
 * One of the post-approval artifact nodes failed.
 */
export class ArtifactGenerationError extends Req2CodeError {
  readonly field: DocumentField;

  constructor(field: DocumentField, message: string, options?: { cause?: unknown }) {
    super(`Failed to generate ${field}: ${message}`);
    this.field = field;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Raised at a node boundary once the run's abort signal fired.
 */
export class WorkflowCancelledError extends Req2CodeError {
  readonly node: string;

  constructor(node: string) {
    super(`Workflow cancelled before ${node}`);
    this.node = node;
  }
}

export class ConfigError extends Req2CodeError {}

export function isTransientCallError(error: unknown): error is TransientCallError {
  return error instanceof TransientCallError;
}

/**
 * Map an HTTP status from a provider error to a transient reason, if it is one.
 */
export function classifyTransientStatus(status: number): TransientReason | null {
  if (status === 408) return 'timeout';
  if (status === 429) return 'rate_limited';
  if (status >= 500 && status < 600) return 'provider_5xx';
  return null;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
