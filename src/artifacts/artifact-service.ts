/**
 * Artifact Service.
 *
 * Writes job outputs to the content store, records their metadata and
 * announces them on the data plane.
 */

import { v4 as uuid } from 'uuid';
import { ArtifactPointer, ArtifactRef, ArtifactType } from '../domain/artifact';
import { describeError } from '../domain/errors';
import { DataPlanePublisher, EVENT_SCHEMA_VERSION } from '../data-plane/publisher';
import { logger } from '../logger';
import { ArtifactStore } from '../storage/store';
import { ArtifactContentStore, StoredContent } from './content-store';

const log = logger.child({ module: 'artifacts' });

export interface ArtifactInput {
  pipelineId: string;
  jobId: string;
  name: string;
  type: ArtifactType;
}

export class ArtifactService {
  constructor(
    private content: ArtifactContentStore,
    private metadata: ArtifactStore,
    private publisher: DataPlanePublisher,
  ) {}

  /** Store content and record an artifact for it. */
  async write(input: ArtifactInput, content: string | Buffer): Promise<ArtifactRef> {
    const stored = await this.content.write(input.pipelineId, input.jobId, input.name, content);
    return this.record(input, stored);
  }

  /** Copy a file produced by a job into the store. */
  async importFile(input: ArtifactInput, sourcePath: string): Promise<ArtifactRef> {
    const stored = await this.content.importFile(input.pipelineId, input.jobId, input.name, sourcePath);
    return this.record(input, stored);
  }

  /** Record a reference to content held elsewhere (e.g., an image registry). */
  async reference(input: ArtifactInput, pointer: ArtifactPointer): Promise<ArtifactRef> {
    return this.record(input, { pointer, sizeBytes: 0, contentHash: '' });
  }

  async read(artifact: ArtifactRef): Promise<Buffer> {
    return this.content.read(artifact.pointer);
  }

  private async record(input: ArtifactInput, stored: StoredContent): Promise<ArtifactRef> {
    const artifact: ArtifactRef = {
      id: `art_${uuid()}`,
      pipelineId: input.pipelineId,
      jobId: input.jobId,
      name: input.name,
      type: input.type,
      pointer: stored.pointer,
      metadata: {
        createdAt: new Date().toISOString(),
        sizeBytes: stored.sizeBytes || undefined,
        contentHash: stored.contentHash || undefined,
      },
    };
    await this.metadata.create(artifact);
    try {
      await this.publisher.publishEvent({
        id: `evt_${uuid()}`,
        type: 'artifact.created',
        schemaVersion: EVENT_SCHEMA_VERSION,
        timestamp: artifact.metadata.createdAt,
        pipelineId: artifact.pipelineId,
        jobId: artifact.jobId,
        artifactId: artifact.id,
        payload: { name: artifact.name, type: artifact.type, location: artifact.pointer.uri },
      });
    } catch (err) {
      log.warn('Failed to publish artifact event', { artifactId: artifact.id, error: describeError(err) });
    }
    return artifact;
  }
}
