/**
 * Job runner: executes one job under its wall-clock budget.
 *
 * The runner owns the job's status: it moves the job to running, hands a
 * context to the kind-specific handler, and always brings the job to a
 * terminal state. A job that exceeds its budget is failed with reason
 * Timeout even if its handler never returns, and its partial log is
 * flushed as an artifact before the job is marked terminal.
 */

import { ArtifactRef } from '../domain/artifact';
import {
  TypedError,
  createTypedError,
  describeError,
  jobCanceledError,
  jobTimeoutError,
} from '../domain/errors';
import { FailureReason, Job, JobKind, JobPhase, JobStatus } from '../domain/job';
import { ArchitectureImage, DriftReport } from '../domain/pipeline';
import { ArtifactService } from '../artifacts/artifact-service';
import { Logger } from '../logger';
import { transitionJobPhase, transitionJobStatus } from './state-machine';

/** Accumulates a job's command output and orchestration notes. */
export class JobOutput {
  private chunks: string[] = [];

  append(chunk: string): void {
    this.chunks.push(chunk);
  }

  line(message: string): void {
    this.chunks.push(`${message}\n`);
  }

  text(): string {
    return this.chunks.join('');
  }

  get isEmpty(): boolean {
    return this.chunks.length === 0;
  }
}

/** Handed to a job handler for the duration of one job. */
export interface JobContext {
  pipelineId: string;
  revision: string;
  job: Job;
  /** Fires on timeout or cancellation; commands must stop when it does. */
  signal: AbortSignal;
  output: JobOutput;
  logger: Logger;
  enterPhase(phase: JobPhase): Promise<void>;
  /** Attach an artifact to the job. Ignored once the job is terminal. */
  attach(artifact: ArtifactRef): void;
}

/** Kind-specific results a handler hands back to the orchestrator. */
export interface JobOutcome {
  driftReport?: DriftReport;
  image?: ArchitectureImage;
  cacheKey?: string;
  cacheHit?: boolean;
}

export interface JobHandler {
  readonly kinds: readonly JobKind[];
  execute(context: JobContext): Promise<JobOutcome>;
}

/**
 * Thrown by handlers to fail a job with a classified reason.
 * The optional outcome still reaches the orchestrator (e.g. a drift report).
 */
export class JobFailure extends Error {
  constructor(
    public reason: FailureReason,
    public typedError: TypedError,
    public outcome?: JobOutcome,
  ) {
    super(typedError.message);
    this.name = 'JobFailure';
  }
}

export interface RunJobParams {
  pipelineId: string;
  revision: string;
  job: Job;
  handler: JobHandler;
  artifacts: ArtifactService;
  logger: Logger;
  /** Cancels the job from outside (pipeline cancellation). */
  cancelSignal?: AbortSignal;
  /** Called after every change of the job's status or phase. */
  onChange?: (job: Job) => Promise<void>;
}

export interface JobRunResult {
  job: Job;
  outcome?: JobOutcome;
}

export const LOG_ARTIFACT_NAME = 'job.log';

type AbortCause = 'timeout' | 'canceled';

class JobAbortedError extends Error {
  constructor(public cause: AbortCause) {
    super(`Job ${cause}`);
    this.name = 'JobAbortedError';
  }
}

/** Run a job to a terminal state. Never throws for job-local failures. */
export async function runJob(params: RunJobParams): Promise<JobRunResult> {
  const { job, handler, logger, onChange } = params;

  const started = transitionJobStatus(job.status, JobStatus.Running);
  if (!started.success) {
    throw new Error(started.error?.message ?? `Job ${job.id} cannot start`);
  }
  const startedAt = new Date();
  job.status = JobStatus.Running;
  job.startedAt = startedAt.toISOString();
  await onChange?.(job);

  const controller = new AbortController();
  let abortCause: AbortCause | undefined;
  let rejectAborted: (err: JobAbortedError) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const abort = (cause: AbortCause): void => {
    if (abortCause) return;
    abortCause = cause;
    controller.abort();
    rejectAborted(new JobAbortedError(cause));
  };

  const timer = setTimeout(() => abort('timeout'), job.timeoutMs);
  const onCancel = (): void => abort('canceled');
  if (params.cancelSignal?.aborted) {
    abort('canceled');
  } else {
    params.cancelSignal?.addEventListener('abort', onCancel, { once: true });
  }

  let settled = false;
  const output = new JobOutput();
  const context: JobContext = {
    pipelineId: params.pipelineId,
    revision: params.revision,
    job,
    signal: controller.signal,
    output,
    logger,
    enterPhase: async (phase) => {
      if (settled) return;
      const result = transitionJobPhase(job.phase, phase);
      if (!result.success) {
        throw new Error(result.error?.message ?? `Invalid phase ${phase}`);
      }
      job.phase = phase;
      output.line(`==> ${phase}`);
      await onChange?.(job);
    },
    attach: (artifact) => {
      if (settled) {
        logger.debug('Artifact produced after job ended; not attached', { artifact: artifact.name });
        return;
      }
      job.artifacts.push(artifact);
    },
  };

  let outcome: JobOutcome | undefined;
  let failure: { reason: FailureReason; error: TypedError } | undefined;

  const execution = handler.execute(context);
  try {
    outcome = await Promise.race([execution, aborted]);
  } catch (err) {
    if (err instanceof JobAbortedError) {
      failure = err.cause === 'timeout'
        ? { reason: FailureReason.Timeout, error: jobTimeoutError(job.id, job.timeoutMs) }
        : { reason: FailureReason.Canceled, error: jobCanceledError(job.id) };
      execution.catch((late) => {
        logger.debug('Handler settled after job was aborted', { error: describeError(late) });
      });
    } else if (err instanceof JobFailure) {
      failure = { reason: err.reason, error: err.typedError };
      outcome = err.outcome;
    } else {
      failure = {
        reason: FailureReason.BuildError,
        error: createTypedError({
          code: 'JOB.HANDLER_ERROR',
          message: describeError(err),
          jobId: job.id,
          retryable: false,
        }),
      };
    }
  } finally {
    clearTimeout(timer);
    params.cancelSignal?.removeEventListener('abort', onCancel);
  }

  if (failure) {
    failure.error.pipelineId = params.pipelineId;
    output.line(`==> failed: ${failure.error.message}`);
  }
  await flushLog(params, output);
  settled = true;

  job.status = failure ? JobStatus.Failed : JobStatus.Succeeded;
  job.phase = undefined;
  job.failureReason = failure?.reason;
  job.error = failure?.error;
  job.cacheKey = outcome?.cacheKey ?? job.cacheKey;
  job.cacheHit = outcome?.cacheHit ?? job.cacheHit;
  const endedAt = new Date();
  job.endedAt = endedAt.toISOString();
  job.durationMs = endedAt.getTime() - startedAt.getTime();
  await onChange?.(job);

  if (failure) {
    logger.warn('Job failed', { reason: failure.reason, code: failure.error.code, durationMs: job.durationMs });
  } else {
    logger.info('Job succeeded', { durationMs: job.durationMs });
  }
  return { job, outcome };
}

async function flushLog(params: RunJobParams, output: JobOutput): Promise<void> {
  if (output.isEmpty) return;
  try {
    const artifact = await params.artifacts.write(
      { pipelineId: params.pipelineId, jobId: params.job.id, name: LOG_ARTIFACT_NAME, type: 'log' },
      output.text(),
    );
    params.job.artifacts.push(artifact);
  } catch (err) {
    params.logger.error('Failed to flush job log', { error: describeError(err) });
  }
}
