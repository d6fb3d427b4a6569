/**
 * Job domain model.
 *
 * A job is one independently schedulable unit of work with its own
 * lifecycle and terminal status. Jobs are created by the matrix expander
 * at pipeline start and mutated only by the executor that owns them.
 */

import { ArtifactRef } from './artifact';
import { TypedError } from './errors';
import { TargetSpec } from './target';

export enum JobKind {
  Build = 'build',
  Lint = 'lint',
  Test = 'test',
  CodegenCheck = 'codegen-check',
  Image = 'image',
}

export enum JobStatus {
  Pending = 'pending',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Skipped = 'skipped',
}

/** Sub-state of a running job. */
export enum JobPhase {
  Provisioning = 'provisioning',
  CacheRestore = 'cache_restore',
  Building = 'building',
  Generating = 'generating',
  Comparing = 'comparing',
  Publishing = 'publishing',
}

/** Classified failure cause, reported alongside the typed error. */
export enum FailureReason {
  ToolchainError = 'ToolchainError',
  BuildError = 'BuildError',
  GenerationError = 'GenerationError',
  DriftError = 'DriftError',
  ImageError = 'ImageError',
  Timeout = 'Timeout',
  Canceled = 'Canceled',
}

/** Valid job status transitions. Monotonic; terminal states have none. */
export const VALID_JOB_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  [JobStatus.Pending]: [JobStatus.Running, JobStatus.Skipped],
  [JobStatus.Running]: [JobStatus.Succeeded, JobStatus.Failed],
  [JobStatus.Succeeded]: [],
  [JobStatus.Failed]: [],
  [JobStatus.Skipped]: [],
};

/** Valid phase sequences within a running job. */
export const VALID_PHASE_TRANSITIONS: Record<JobPhase | 'start', JobPhase[]> = {
  start: [JobPhase.Provisioning],
  [JobPhase.Provisioning]: [JobPhase.CacheRestore, JobPhase.Generating, JobPhase.Publishing],
  [JobPhase.CacheRestore]: [JobPhase.Building],
  [JobPhase.Building]: [],
  [JobPhase.Generating]: [JobPhase.Comparing],
  [JobPhase.Comparing]: [],
  [JobPhase.Publishing]: [],
};

/** One unit of work in a pipeline. */
export interface Job {
  id: string;
  kind: JobKind;
  /** Null for lint, test and codegen-check. */
  target: TargetSpec | null;
  status: JobStatus;
  phase?: JobPhase;
  /** Whether a failure of this job fails the pipeline. */
  required: boolean;
  /** Whether a failure of this job skips the remaining pending jobs. */
  failFast: boolean;
  /** Wall-clock budget. */
  timeoutMs: number;
  startedAt?: string;
  endedAt?: string;
  durationMs?: number;
  artifacts: ArtifactRef[];
  failureReason?: FailureReason;
  error?: TypedError;
  cacheKey?: string;
  cacheHit?: boolean;
}
