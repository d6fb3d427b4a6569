/**
 * Pipeline domain model.
 *
 * A single verification of one source revision: the expanded job set,
 * the drift report, the image manifest and the gate verdict.
 */

import { ArtifactRef } from './artifact';
import { TypedError } from './errors';
import { FailureReason, Job, JobKind, JobStatus } from './job';
import { TargetSpec } from './target';

/** What triggered the pipeline. */
export enum TriggerEvent {
  Push = 'push',
  PullRequest = 'pull-request',
  PullRequestDraft = 'pull-request-draft',
}

export enum PipelineStatus {
  Created = 'created',
  Running = 'running',
  Succeeded = 'succeeded',
  Failed = 'failed',
  Canceled = 'canceled',
}

export const VALID_PIPELINE_TRANSITIONS: Record<PipelineStatus, PipelineStatus[]> = {
  [PipelineStatus.Created]: [PipelineStatus.Running, PipelineStatus.Canceled],
  [PipelineStatus.Running]: [PipelineStatus.Succeeded, PipelineStatus.Failed, PipelineStatus.Canceled],
  [PipelineStatus.Succeeded]: [],
  [PipelineStatus.Failed]: [],
  [PipelineStatus.Canceled]: [],
};

export function isDraftEvent(event: TriggerEvent): boolean {
  return event === TriggerEvent.PullRequestDraft;
}

export type PathChange = 'added' | 'modified' | 'deleted';

export interface ChangedPath {
  path: string;
  change: PathChange;
}

/** Outcome of comparing regenerated code with the committed tree. */
export interface DriftReport {
  hasDrift: boolean;
  changedPaths: ChangedPath[];
  diffArtifact?: ArtifactRef;
}

export type ManifestStatus = 'pending' | 'succeeded' | 'failed' | 'skipped';

export interface ArchitectureImage {
  architecture: string;
  reference: string;
}

/** Multi-architecture manifest assembled after every image job. */
export interface ImageManifest {
  status: ManifestStatus;
  reference?: string;
  images: ArchitectureImage[];
  error?: TypedError;
}

/** A job kind left out of the job set, and why. */
export interface OmittedKind {
  kind: JobKind;
  reason: 'draft';
}

export interface PipelineRun {
  id: string;
  revision: string;
  event: TriggerEvent;
  draft: boolean;
  status: PipelineStatus;
  jobs: Job[];
  omitted: OmittedKind[];
  driftReport?: DriftReport;
  manifest?: ImageManifest;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  error?: TypedError;
  canceledAt?: string;
  cancelReason?: string;
}

export interface CreatePipelineInput {
  revision: string;
  event: TriggerEvent;
}

export interface ReportedArtifact {
  name: string;
  type: string;
  location: string;
}

export interface ReportedJob {
  id: string;
  kind: JobKind;
  target: TargetSpec | null;
  status: JobStatus;
  required: boolean;
  failureReason?: FailureReason;
  error?: TypedError;
  durationMs?: number;
  cacheHit?: boolean;
  artifacts: ReportedArtifact[];
}

/** Structured pipeline result. */
export interface PipelineReport {
  pipelineId: string;
  revision: string;
  event: TriggerEvent;
  status: PipelineStatus;
  exitCode: 0 | 1;
  jobs: ReportedJob[];
  requiredFailures: string[];
  requiredSkipped: string[];
  omitted: OmittedKind[];
  driftReport?: DriftReport;
  manifest?: ImageManifest;
}
