/**
 * Gate Aggregator.
 *
 * Reduces terminal job statuses (and the image manifest) into one pipeline
 * verdict and the structured report.
 */

import { Job, JobStatus } from '../domain/job';
import {
  ImageManifest,
  PipelineReport,
  PipelineRun,
  PipelineStatus,
  ReportedJob,
} from '../domain/pipeline';

export interface GateVerdict {
  status: PipelineStatus.Succeeded | PipelineStatus.Failed;
  exitCode: 0 | 1;
  /** Ids of required jobs that failed, plus "manifest" when it failed. */
  requiredFailures: string[];
  /** Ids of required jobs skipped by fail-fast or cancellation. */
  requiredSkipped: string[];
}

export const MANIFEST_GATE_ID = 'manifest';

/**
 * Every required job must succeed. Optional jobs may fail or be skipped
 * without failing the pipeline. Kinds omitted on drafts have no jobs and
 * are not counted.
 */
export function aggregate(jobs: Job[], manifest?: ImageManifest): GateVerdict {
  const required = jobs.filter((job) => job.required);
  const requiredFailures = required.filter((job) => job.status === JobStatus.Failed).map((job) => job.id);
  const requiredSkipped = required.filter((job) => job.status === JobStatus.Skipped).map((job) => job.id);
  if (manifest?.status === 'failed') {
    requiredFailures.push(MANIFEST_GATE_ID);
  }
  const failed = requiredFailures.length > 0 || requiredSkipped.length > 0;
  return {
    status: failed ? PipelineStatus.Failed : PipelineStatus.Succeeded,
    exitCode: failed ? 1 : 0,
    requiredFailures,
    requiredSkipped,
  };
}

function reportJob(job: Job): ReportedJob {
  return {
    id: job.id,
    kind: job.kind,
    target: job.target,
    status: job.status,
    required: job.required,
    failureReason: job.failureReason,
    error: job.error,
    durationMs: job.durationMs,
    cacheHit: job.cacheHit,
    artifacts: job.artifacts.map((a) => ({ name: a.name, type: a.type, location: a.pointer.uri })),
  };
}

/** Build the report of a pipeline. A pipeline that did not succeed exits 1. */
export function buildReport(pipeline: PipelineRun): PipelineReport {
  const verdict = aggregate(pipeline.jobs, pipeline.manifest);
  return {
    pipelineId: pipeline.id,
    revision: pipeline.revision,
    event: pipeline.event,
    status: pipeline.status,
    exitCode: pipeline.status === PipelineStatus.Succeeded ? 0 : 1,
    jobs: pipeline.jobs.map(reportJob),
    requiredFailures: verdict.requiredFailures,
    requiredSkipped: verdict.requiredSkipped,
    omitted: pipeline.omitted,
    driftReport: pipeline.driftReport,
    manifest: pipeline.manifest,
  };
}
