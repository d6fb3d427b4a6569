/**
 * Typed error model for machine-actionable error handling.
 *
 * Job failures are recorded as typed values on the job and in the pipeline
 * report rather than thrown across job boundaries, so that the gate and any
 * consumer of the report can classify failures without parsing messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIG'
  | 'TOOLCHAIN'
  | 'BUILD'
  | 'CODEGEN'
  | 'CACHE'
  | 'IMAGE'
  | 'JOB'
  | 'PIPELINE'
  | 'ARTIFACT'
  | 'VALIDATION'
  | 'SYSTEM';

/** Typed suggested fix that a consumer can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure recorded on jobs, reports and API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "BUILD.COMMAND_FAILED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Associated job if applicable. */
  jobId?: string;
  /** Associated pipeline if applicable. */
  pipelineId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  jobId?: string;
  pipelineId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    jobId: params.jobId,
    pipelineId: params.pipelineId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Configuration ---

export function configurationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

// --- Job-local failure classes ---

export function toolchainError(jobId: string, capability: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'TOOLCHAIN.PROVISION_FAILED',
    message: `Toolchain provisioning failed for ${capability}: ${message}`,
    jobId,
    retryable: false,
    details: { capability, ...details },
    suggestedFixes: [
      { type: 'CHECK_TOOLCHAIN', params: { capability }, description: `Verify that ${capability} can be installed on this host` },
    ],
  });
}

export function buildError(jobId: string, step: string, exitCode: number | null, stderrTail?: string): TypedError {
  return createTypedError({
    code: 'BUILD.COMMAND_FAILED',
    message: exitCode === null
      ? `Step "${step}" could not be started`
      : `Step "${step}" exited with code ${exitCode}`,
    jobId,
    retryable: false,
    details: { step, exitCode, stderrTail },
  });
}

export function missingOutputError(jobId: string, outputPath: string): TypedError {
  return createTypedError({
    code: 'BUILD.OUTPUT_MISSING',
    message: `Declared build output was not produced: ${outputPath}`,
    jobId,
    retryable: false,
    details: { outputPath },
  });
}

export function generationError(jobId: string, exitCode: number | null, stderrTail?: string): TypedError {
  return createTypedError({
    code: 'CODEGEN.GENERATION_FAILED',
    message: exitCode === null
      ? 'Code generator could not be started'
      : `Code generator exited with code ${exitCode}`,
    jobId,
    retryable: false,
    details: { exitCode, stderrTail },
  });
}

export function driftError(jobId: string, changedPaths: string[]): TypedError {
  return createTypedError({
    code: 'CODEGEN.DRIFT',
    message: `Generated code differs from the committed tree in ${changedPaths.length} path(s)`,
    jobId,
    retryable: false,
    details: { changedPaths },
    suggestedFixes: [
      { type: 'REGENERATE', params: {}, description: 'Run the code generator locally and commit the result' },
    ],
  });
}

export function jobTimeoutError(jobId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'JOB.TIMEOUT',
    message: `Job exceeded its time budget of ${timeoutMs}ms`,
    jobId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function jobCanceledError(jobId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'JOB.CANCELED',
    message: reason ? `Job canceled: ${reason}` : 'Job canceled',
    jobId,
    retryable: true,
    details: reason ? { reason } : undefined,
  });
}

export function imageError(jobId: string, architecture: string, message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'IMAGE.BUILD_FAILED',
    message: `Image build for ${architecture} failed: ${message}`,
    jobId,
    retryable: false,
    details: { architecture, ...details },
  });
}

export function manifestError(message: string, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'IMAGE.MANIFEST_FAILED',
    message,
    retryable: false,
    details,
  });
}

/** Cache errors are advisory: they are logged and reported, never fatal. */
export function cacheError(operation: 'restore' | 'save', key: string, message: string): TypedError {
  return createTypedError({
    code: operation === 'restore' ? 'CACHE.RESTORE_FAILED' : 'CACHE.SAVE_FAILED',
    message: `Cache ${operation} failed for key "${key}": ${message}`,
    retryable: true,
    details: { key },
  });
}

// --- Pipeline-level ---

export function pipelineAlreadyRunningError(pipelineId: string): TypedError {
  return createTypedError({
    code: 'PIPELINE.ALREADY_RUNNING',
    message: `Pipeline "${pipelineId}" is already being executed`,
    pipelineId,
    retryable: false,
  });
}

export function pipelineInvalidStateTransition(pipelineId: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'PIPELINE.INVALID_STATE_TRANSITION',
    message: `Cannot transition pipeline from "${from}" to "${to}"`,
    pipelineId,
    retryable: false,
    details: { from, to },
  });
}

/** Render an unknown thrown value as a message. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}

/**
 * Thrown when the pipeline configuration or matrix is malformed.
 * Raised before any job starts; carries every problem found.
 */
export class ConfigurationError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ConfigurationError';
  }

  /** Individual problems, when the error was built from a validation pass. */
  get problems(): string[] {
    const problems = this.typedError.details?.problems;
    return Array.isArray(problems) ? problems.filter((p): p is string => typeof p === 'string') : [];
  }
}
