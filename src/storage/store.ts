/**
 * Storage layer interfaces.
 *
 * Defines the contract for data persistence with pluggable backends.
 */

import { ArtifactRef } from '../domain/artifact';
import { DataPlaneEvent } from '../domain/events';
import { PipelineRun } from '../domain/pipeline';

/** Generic list query options. */
export interface ListOptions {
  limit?: number;
  offset?: number;
}

/** Store interface for pipeline runs (jobs are stored inside their pipeline). */
export interface PipelineStore {
  create(pipeline: PipelineRun): Promise<PipelineRun>;
  getById(id: string): Promise<PipelineRun | null>;
  update(id: string, pipeline: Partial<PipelineRun>): Promise<PipelineRun | null>;
  /** Most recent first. */
  list(options?: ListOptions): Promise<PipelineRun[]>;
  count(): Promise<number>;
}

/** Store interface for artifact metadata. Content lives in the artifact content store. */
export interface ArtifactStore {
  create(artifact: ArtifactRef): Promise<ArtifactRef>;
  getById(id: string): Promise<ArtifactRef | null>;
  listByPipeline(pipelineId: string, options?: ListOptions): Promise<ArtifactRef[]>;
}

/** Store interface for data plane events. */
export interface EventStore {
  create(event: DataPlaneEvent): Promise<DataPlaneEvent>;
  listByPipeline(pipelineId: string, options?: ListOptions & { eventTypes?: string[] }): Promise<DataPlaneEvent[]>;
}

/** Composite store interface. */
export interface Store {
  pipelines: PipelineStore;
  artifacts: ArtifactStore;
  events: EventStore;
}
