/**
 * Run-time Data Plane Publisher.
 *
 * Emits stable, versioned pipeline and job events and keeps them
 * queryable per pipeline.
 */

import { v4 as uuid } from 'uuid';
import { DataPlaneEvent, DataPlaneEventType, EventSubscription } from '../domain/events';
import { describeError } from '../domain/errors';
import { Job } from '../domain/job';
import { PipelineRun } from '../domain/pipeline';
import { logger } from '../logger';
import { EventStore } from '../storage/store';

export const EVENT_SCHEMA_VERSION = '1.0.0';

const log = logger.child({ module: 'data-plane' });

/** The data plane publisher. */
export class DataPlanePublisher {
  private subscriptions: EventSubscription[] = [];

  constructor(private events: EventStore) {}

  /** Publish a pipeline lifecycle event. */
  async publishPipelineEvent(pipeline: PipelineRun, eventType: DataPlaneEventType): Promise<DataPlaneEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      pipelineId: pipeline.id,
      payload: {
        status: pipeline.status,
        revision: pipeline.revision,
        event: pipeline.event,
        error: pipeline.error,
      },
    });
  }

  /** Publish a job lifecycle event. */
  async publishJobEvent(
    pipelineId: string,
    job: Job,
    eventType: DataPlaneEventType,
    extra: Record<string, unknown> = {},
  ): Promise<DataPlaneEvent> {
    return this.publishEvent({
      id: `evt_${uuid()}`,
      type: eventType,
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      pipelineId,
      jobId: job.id,
      payload: {
        kind: job.kind,
        status: job.status,
        phase: job.phase,
        failureReason: job.failureReason,
        durationMs: job.durationMs,
        error: job.error,
        ...extra,
      },
    });
  }

  /** Publish an arbitrary event. */
  async publishEvent(event: DataPlaneEvent): Promise<DataPlaneEvent> {
    await this.events.create(event);

    for (const sub of this.subscriptions) {
      if (this.matchesSubscription(event, sub)) {
        try {
          sub.callback(event);
        } catch (err) {
          log.warn('Event subscriber threw', { subscriptionId: sub.id, eventType: event.type, error: describeError(err) });
        }
      }
    }

    return event;
  }

  /** Subscribe to events. Returns an unsubscribe function. */
  subscribe(subscription: EventSubscription): () => void {
    this.subscriptions.push(subscription);
    return () => {
      this.subscriptions = this.subscriptions.filter((s) => s.id !== subscription.id);
    };
  }

  /** Query events by pipeline. */
  async getEventsByPipeline(pipelineId: string, eventTypes?: DataPlaneEventType[]): Promise<DataPlaneEvent[]> {
    return this.events.listByPipeline(pipelineId, { eventTypes, limit: Number.MAX_SAFE_INTEGER });
  }

  private matchesSubscription(event: DataPlaneEvent, sub: EventSubscription): boolean {
    if (sub.pipelineId && event.pipelineId !== sub.pipelineId) return false;
    if (sub.eventTypes?.length && !sub.eventTypes.includes(event.type)) return false;
    return true;
  }
}
