/**
 * Pipeline and job state machines.
 *
 * Enforces valid state transitions for pipelines, jobs and job phases,
 * producing typed errors on invalid transitions.
 */

import {
  JobPhase,
  JobStatus,
  VALID_JOB_TRANSITIONS,
  VALID_PHASE_TRANSITIONS,
} from '../domain/job';
import { PipelineStatus, VALID_PIPELINE_TRANSITIONS } from '../domain/pipeline';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a pipeline state transition. */
export function transitionPipelineStatus(
  current: PipelineStatus,
  target: PipelineStatus,
): TransitionResult<PipelineStatus> {
  const validTargets = VALID_PIPELINE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'PIPELINE.INVALID_TRANSITION',
        message: `Invalid pipeline state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a job state transition. */
export function transitionJobStatus(
  current: JobStatus,
  target: JobStatus,
): TransitionResult<JobStatus> {
  const validTargets = VALID_JOB_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'JOB.INVALID_TRANSITION',
        message: `Invalid job state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a phase transition within a running job. */
export function transitionJobPhase(
  current: JobPhase | undefined,
  target: JobPhase,
): TransitionResult<JobPhase> {
  const validTargets = VALID_PHASE_TRANSITIONS[current ?? 'start'];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'JOB.INVALID_PHASE',
        message: `Invalid job phase transition: ${current ?? 'start'} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

export function isTerminalPipelineStatus(status: PipelineStatus): boolean {
  return (
    status === PipelineStatus.Succeeded ||
    status === PipelineStatus.Failed ||
    status === PipelineStatus.Canceled
  );
}

export function isTerminalJobStatus(status: JobStatus): boolean {
  return (
    status === JobStatus.Succeeded ||
    status === JobStatus.Failed ||
    status === JobStatus.Skipped
  );
}
