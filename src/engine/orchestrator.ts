/**
 * Pipeline Orchestrator: the core scheduling engine.
 *
 * Expands the matrix into jobs, runs them through a bounded pool of runner
 * slots, applies fail-fast and cancellation, assembles the image manifest
 * and hands the terminal job set to the gate.
 */

import { v4 as uuid } from 'uuid';
import {
  TypedError,
  createTypedError,
  describeError,
  notFoundError,
  pipelineAlreadyRunningError,
  pipelineInvalidStateTransition,
} from '../domain/errors';
import { DataPlaneEventType } from '../domain/events';
import { FailureReason, Job, JobKind, JobStatus } from '../domain/job';
import {
  ArchitectureImage,
  CreatePipelineInput,
  ImageManifest,
  PipelineReport,
  PipelineRun,
  PipelineStatus,
  isDraftEvent,
} from '../domain/pipeline';
import { MatrixDeclaration } from '../domain/target';
import { ArtifactService } from '../artifacts/artifact-service';
import { DataPlanePublisher, EVENT_SCHEMA_VERSION } from '../data-plane/publisher';
import { DEFAULT_JOB_POLICY, JobPolicy, expandMatrix } from '../matrix/expander';
import { VALID_TRIGGER_EVENTS } from '../matrix/schema';
import { Logger, logger as rootLogger } from '../logger';
import { ListOptions, Store } from '../storage/store';
import { aggregate, buildReport } from './gate';
import { JobHandler, runJob } from './job-runner';
import {
  isTerminalJobStatus,
  isTerminalPipelineStatus,
  transitionJobStatus,
  transitionPipelineStatus,
} from './state-machine';

/** Assembles the multi-architecture manifest once image jobs are terminal. */
export interface ManifestAssembler {
  assembleManifest(
    revision: string,
    jobs: Job[],
    images: ArchitectureImage[],
    signal?: AbortSignal,
  ): Promise<ImageManifest | undefined>;
}

export interface OrchestratorConfig {
  matrix: MatrixDeclaration;
  policy: JobPolicy;
  /** Number of jobs that may run at once. */
  maxConcurrency: number;
}

export interface OrchestratorDeps {
  store: Store;
  publisher: DataPlanePublisher;
  artifacts: ArtifactService;
  handlers: JobHandler[];
  manifests?: ManifestAssembler;
  logger?: Logger;
}

interface CancelRequest {
  canceledAt: string;
  reason?: string;
}

/** An execution in flight. `pipeline` is unset until the record has loaded. */
interface Execution {
  controller: AbortController;
  pipeline?: PipelineRun;
  cancel?: CancelRequest;
}

export class PipelineOrchestrator {
  private handlers = new Map<JobKind, JobHandler>();
  /** Claimed by executePipeline before its first await. */
  private executions = new Map<string, Execution>();
  private config: OrchestratorConfig;
  private log: Logger;

  constructor(private deps: OrchestratorDeps, config: Partial<OrchestratorConfig> & { matrix: MatrixDeclaration }) {
    this.config = {
      policy: DEFAULT_JOB_POLICY,
      maxConcurrency: 4,
      ...config,
    };
    this.log = deps.logger ?? rootLogger.child({ module: 'orchestrator' });
    for (const handler of deps.handlers) {
      for (const kind of handler.kinds) {
        this.handlers.set(kind, handler);
      }
    }
  }

  /**
   * Expand the matrix for a trigger and record the pipeline.
   * Throws ConfigurationError for a malformed matrix, before any job exists.
   */
  async createPipeline(input: CreatePipelineInput): Promise<PipelineRun> {
    if (typeof input.revision !== 'string' || input.revision.trim().length === 0) {
      throw new OrchestratorError(invalidInput('revision is required'));
    }
    if (!VALID_TRIGGER_EVENTS.includes(input.event)) {
      throw new OrchestratorError(
        invalidInput(`Unknown trigger event "${String(input.event)}"; expected one of ${VALID_TRIGGER_EVENTS.join(', ')}`),
      );
    }

    const expansion = expandMatrix(this.config.matrix, input.event, this.config.policy);
    for (const warning of expansion.warnings) {
      this.log.warn(warning, { revision: input.revision });
    }

    const now = new Date().toISOString();
    const pipeline: PipelineRun = {
      id: `pl_${uuid()}`,
      revision: input.revision,
      event: input.event,
      draft: isDraftEvent(input.event),
      status: PipelineStatus.Created,
      jobs: expansion.jobs,
      omitted: expansion.omitted,
      createdAt: now,
      updatedAt: now,
    };

    await this.deps.store.pipelines.create(pipeline);
    await this.safePublishPipelineEvent(pipeline, 'pipeline.created');
    this.log.info('Pipeline created', {
      pipelineId: pipeline.id,
      revision: pipeline.revision,
      event: pipeline.event,
      jobs: pipeline.jobs.length,
    });
    return pipeline;
  }

  /** Run every job of a created pipeline to a terminal state. */
  async executePipeline(pipelineId: string): Promise<PipelineRun> {
    if (this.executions.has(pipelineId)) {
      throw new OrchestratorError(pipelineAlreadyRunningError(pipelineId));
    }
    const execution: Execution = { controller: new AbortController() };
    this.executions.set(pipelineId, execution);
    try {
      const pipeline = await this.deps.store.pipelines.getById(pipelineId);
      if (!pipeline) {
        throw new OrchestratorError(notFoundError('Pipeline', pipelineId));
      }
      this.transitionPipeline(pipeline, PipelineStatus.Running);
      if (execution.cancel) applyCancel(pipeline, execution.cancel);
      execution.pipeline = pipeline;
      return await this.executeInternal(pipeline, execution.controller);
    } finally {
      this.executions.delete(pipelineId);
    }
  }

  /** Create and execute in one call. */
  async runPipeline(input: CreatePipelineInput): Promise<PipelineRun> {
    const pipeline = await this.createPipeline(input);
    return this.executePipeline(pipeline.id);
  }

  /**
   * Cancel a pipeline. Running jobs are aborted and fail with reason
   * Canceled; pending jobs are skipped.
   */
  async cancelPipeline(pipelineId: string, reason?: string): Promise<PipelineRun> {
    const cancel: CancelRequest = { canceledAt: new Date().toISOString(), reason };
    const execution = this.executions.get(pipelineId);
    if (execution) {
      // Recorded before any await so that a pipeline still loading starts canceled.
      execution.cancel = cancel;
      execution.controller.abort();
      this.log.info('Pipeline cancellation requested', { pipelineId, reason });
      if (execution.pipeline) {
        applyCancel(execution.pipeline, cancel);
        return structuredClone(execution.pipeline);
      }
      // Still loading: answer from the stored record; the execution applies the request once loaded.
      const stored = await this.getPipeline(pipelineId);
      if (isTerminalPipelineStatus(stored.status)) {
        throw new OrchestratorError(pipelineInvalidStateTransition(pipelineId, stored.status, PipelineStatus.Canceled));
      }
      return { ...stored, canceledAt: cancel.canceledAt, cancelReason: reason };
    }

    const pipeline = await this.deps.store.pipelines.getById(pipelineId);
    if (!pipeline) {
      throw new OrchestratorError(notFoundError('Pipeline', pipelineId));
    }
    applyCancel(pipeline, cancel);
    for (const job of pipeline.jobs) {
      if (job.status === JobStatus.Pending) this.skipJob(job);
    }
    this.transitionPipeline(pipeline, PipelineStatus.Canceled);
    pipeline.completedAt = pipeline.canceledAt;
    await this.persist(pipeline);
    await this.safePublishPipelineEvent(pipeline, 'pipeline.canceled');
    return pipeline;
  }

  async getPipeline(pipelineId: string): Promise<PipelineRun> {
    const pipeline = await this.deps.store.pipelines.getById(pipelineId);
    if (!pipeline) {
      throw new OrchestratorError(notFoundError('Pipeline', pipelineId));
    }
    return pipeline;
  }

  async listPipelines(options?: ListOptions): Promise<PipelineRun[]> {
    return this.deps.store.pipelines.list(options);
  }

  async countPipelines(): Promise<number> {
    return this.deps.store.pipelines.count();
  }

  async getReport(pipelineId: string): Promise<PipelineReport> {
    return buildReport(await this.getPipeline(pipelineId));
  }

  private async executeInternal(pipeline: PipelineRun, controller: AbortController): Promise<PipelineRun> {
    pipeline.startedAt = new Date().toISOString();
    await this.persist(pipeline);
    await this.safePublishPipelineEvent(pipeline, 'pipeline.started');

    const images = new Map<string, ArchitectureImage>();
    const queue = [...pipeline.jobs];
    const slots = Math.max(1, Math.min(this.config.maxConcurrency, queue.length));

    const worker = async (): Promise<void> => {
      for (let job = queue.shift(); job; job = queue.shift()) {
        if (job.status !== JobStatus.Pending) continue;
        if (controller.signal.aborted) {
          this.skipJob(job);
          await this.persist(pipeline);
          await this.safePublishJobEvent(pipeline.id, job, 'job.skipped');
          continue;
        }

        const status = await this.runOne(pipeline, job, controller.signal, images);

        if (status === JobStatus.Failed && job.failFast && !controller.signal.aborted) {
          await this.skipPending(pipeline, queue, job);
        }
      }
    };

    await Promise.all(Array.from({ length: slots }, () => worker()));

    if (controller.signal.aborted) {
      this.transitionPipeline(pipeline, PipelineStatus.Canceled);
      pipeline.completedAt = new Date().toISOString();
      await this.persist(pipeline);
      await this.safePublishPipelineEvent(pipeline, 'pipeline.canceled');
      this.log.info('Pipeline canceled', { pipelineId: pipeline.id, reason: pipeline.cancelReason });
      return pipeline;
    }

    if (this.deps.manifests) {
      // Declaration order, not completion order.
      const published = pipeline.jobs.flatMap((j) => images.get(j.id) ?? []);
      pipeline.manifest = await this.deps.manifests.assembleManifest(pipeline.revision, pipeline.jobs, published);
      if (pipeline.manifest) {
        await this.safePublishEvent(pipeline.id, 'manifest.assembled', { ...pipeline.manifest });
      }
    }

    const verdict = aggregate(pipeline.jobs, pipeline.manifest);
    this.transitionPipeline(pipeline, verdict.status);
    if (verdict.status === PipelineStatus.Failed) {
      pipeline.error = requiredJobsError(pipeline.id, verdict.requiredFailures, verdict.requiredSkipped);
    }
    pipeline.completedAt = new Date().toISOString();
    await this.persist(pipeline);
    await this.safePublishPipelineEvent(
      pipeline,
      verdict.status === PipelineStatus.Succeeded ? 'pipeline.succeeded' : 'pipeline.failed',
    );
    this.log.info('Pipeline finished', {
      pipelineId: pipeline.id,
      status: pipeline.status,
      requiredFailures: verdict.requiredFailures,
      requiredSkipped: verdict.requiredSkipped,
    });
    return pipeline;
  }

  /** Run one job and return its terminal status. */
  private async runOne(
    pipeline: PipelineRun,
    job: Job,
    signal: AbortSignal,
    images: Map<string, ArchitectureImage>,
  ): Promise<JobStatus> {
    const handler = this.handlers.get(job.kind);
    const jobLog = this.log.child({ pipelineId: pipeline.id, jobId: job.id });
    if (!handler) {
      jobLog.error('No handler registered for job kind', { kind: job.kind });
      job.status = JobStatus.Failed;
      job.failureReason = FailureReason.BuildError;
      job.error = createTypedError({
        code: 'JOB.NO_HANDLER',
        message: `No handler registered for ${job.kind} jobs`,
        jobId: job.id,
        pipelineId: pipeline.id,
      });
      await this.persist(pipeline);
      await this.safePublishJobEvent(pipeline.id, job, 'job.failed');
      return job.status;
    }

    try {
      const { outcome } = await runJob({
        pipelineId: pipeline.id,
        revision: pipeline.revision,
        job,
        handler,
        artifacts: this.deps.artifacts,
        logger: jobLog,
        cancelSignal: signal,
        onChange: async (changed) => {
          await this.persist(pipeline);
          await this.safePublishJobEvent(pipeline.id, changed, jobEventType(changed));
        },
      });
      if (outcome?.driftReport) pipeline.driftReport = outcome.driftReport;
      if (outcome?.image && job.status === JobStatus.Succeeded) images.set(job.id, outcome.image);
    } catch (err) {
      jobLog.error('Job runner failed', { error: describeError(err) });
      if (!isTerminalJobStatus(job.status)) {
        job.status = JobStatus.Failed;
        job.failureReason = FailureReason.BuildError;
        job.error = createTypedError({
          code: 'JOB.RUNNER_ERROR',
          message: describeError(err),
          jobId: job.id,
          pipelineId: pipeline.id,
        });
        await this.persist(pipeline);
      }
    }
    return job.status;
  }

  /** Fail-fast: pending jobs are skipped, running jobs finish. */
  private async skipPending(pipeline: PipelineRun, queue: Job[], failed: Job): Promise<void> {
    const skipped = queue.filter((job) => job.status === JobStatus.Pending);
    if (skipped.length === 0) return;
    this.log.info('Fail-fast: skipping pending jobs', {
      pipelineId: pipeline.id,
      failedJob: failed.id,
      skipped: skipped.map((j) => j.id),
    });
    for (const job of skipped) {
      this.skipJob(job);
    }
    await this.persist(pipeline);
    for (const job of skipped) {
      await this.safePublishJobEvent(pipeline.id, job, 'job.skipped');
    }
  }

  private skipJob(job: Job): void {
    const result = transitionJobStatus(job.status, JobStatus.Skipped);
    if (!result.success) return;
    job.status = JobStatus.Skipped;
  }

  private transitionPipeline(pipeline: PipelineRun, target: PipelineStatus): void {
    const result = transitionPipelineStatus(pipeline.status, target);
    if (!result.success) {
      throw new OrchestratorError(pipelineInvalidStateTransition(pipeline.id, pipeline.status, target));
    }
    pipeline.status = target;
    pipeline.updatedAt = new Date().toISOString();
  }

  private async persist(pipeline: PipelineRun): Promise<void> {
    pipeline.updatedAt = new Date().toISOString();
    await this.deps.store.pipelines.update(pipeline.id, pipeline);
  }

  // Publishing is observational: failures are logged and the pipeline carries on.

  private async safePublishPipelineEvent(pipeline: PipelineRun, type: DataPlaneEventType): Promise<void> {
    try {
      await this.deps.publisher.publishPipelineEvent(pipeline, type);
    } catch (err) {
      this.log.warn('Failed to publish pipeline event', { pipelineId: pipeline.id, type, error: describeError(err) });
    }
  }

  private async safePublishJobEvent(pipelineId: string, job: Job, type: DataPlaneEventType): Promise<void> {
    try {
      await this.deps.publisher.publishJobEvent(pipelineId, job, type);
    } catch (err) {
      this.log.warn('Failed to publish job event', { pipelineId, jobId: job.id, type, error: describeError(err) });
    }
  }

  private async safePublishEvent(pipelineId: string, type: DataPlaneEventType, payload: Record<string, unknown>): Promise<void> {
    try {
      await this.deps.publisher.publishEvent({
        id: `evt_${uuid()}`,
        type,
        schemaVersion: EVENT_SCHEMA_VERSION,
        timestamp: new Date().toISOString(),
        pipelineId,
        payload,
      });
    } catch (err) {
      this.log.warn('Failed to publish event', { pipelineId, type, error: describeError(err) });
    }
  }
}

function jobEventType(job: Job): DataPlaneEventType {
  switch (job.status) {
    case JobStatus.Running:
      return job.phase ? 'job.phase' : 'job.started';
    case JobStatus.Succeeded:
      return 'job.succeeded';
    case JobStatus.Skipped:
      return 'job.skipped';
    default:
      return 'job.failed';
  }
}

function invalidInput(message: string): TypedError {
  return createTypedError({ code: 'VALIDATION.INVALID_INPUT', message, retryable: false });
}

function requiredJobsError(pipelineId: string, requiredFailures: string[], requiredSkipped: string[]): TypedError {
  const parts: string[] = [];
  if (requiredFailures.length > 0) parts.push(`failed: ${requiredFailures.join(', ')}`);
  if (requiredSkipped.length > 0) parts.push(`skipped: ${requiredSkipped.join(', ')}`);
  return createTypedError({
    code: 'PIPELINE.REQUIRED_JOBS_FAILED',
    message: `Required jobs did not succeed (${parts.join('; ')})`,
    pipelineId,
    retryable: false,
    details: { requiredFailures, requiredSkipped },
  });
}

function applyCancel(pipeline: PipelineRun, cancel: CancelRequest): void {
  pipeline.canceledAt = cancel.canceledAt;
  pipeline.cancelReason = cancel.reason;
}

/** Thrown for orchestrator misuse: unknown pipeline, double execution, invalid transition. */
export class OrchestratorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'OrchestratorError';
  }
}
