/**
 * Run-time data plane event domain model.
 *
 * Events are emitted as stable, versioned schemas for downstream consumers.
 */

/** Event types emitted by the data plane. */
export type DataPlaneEventType =
  | 'pipeline.created'
  | 'pipeline.started'
  | 'pipeline.succeeded'
  | 'pipeline.failed'
  | 'pipeline.canceled'
  | 'job.started'
  | 'job.phase'
  | 'job.succeeded'
  | 'job.failed'
  | 'job.skipped'
  | 'artifact.created'
  | 'manifest.assembled';

/** A data plane event with stable schema. */
export interface DataPlaneEvent {
  id: string;
  type: DataPlaneEventType;
  /** Event schema version for forward compatibility. */
  schemaVersion: string;
  timestamp: string;
  pipelineId: string;
  jobId?: string;
  artifactId?: string;
  /** Event-specific payload. */
  payload: Record<string, unknown>;
}

/** Event stream subscription. */
export interface EventSubscription {
  id: string;
  /** Restrict delivery to one pipeline. */
  pipelineId?: string;
  /** Filter by event types. */
  eventTypes?: DataPlaneEventType[];
  /** Callback for event delivery. */
  callback: (event: DataPlaneEvent) => void;
}
