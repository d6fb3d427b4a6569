/**
 * In-memory storage implementation.
 *
 * Reference implementation for development, the CLI and tests.
 */

import { ArtifactRef } from '../domain/artifact';
import { DataPlaneEvent } from '../domain/events';
import { PipelineRun } from '../domain/pipeline';
import { Store, PipelineStore, ArtifactStore, EventStore, ListOptions } from './store';

function applyListOptions<T>(items: T[], options?: ListOptions): T[] {
  const offset = options?.offset ?? 0;
  const limit = options?.limit ?? 100;
  return items.slice(offset, offset + limit);
}

/**
 * Stored records are copied on the way in and out so callers never hold a
 * reference into the store's own state (jobs and artifacts are nested).
 */
function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryPipelineStore implements PipelineStore {
  private data = new Map<string, PipelineRun>();

  async create(pipeline: PipelineRun): Promise<PipelineRun> {
    this.data.set(pipeline.id, deepCopy(pipeline));
    return deepCopy(pipeline);
  }

  async getById(id: string): Promise<PipelineRun | null> {
    const pipeline = this.data.get(id);
    return pipeline ? deepCopy(pipeline) : null;
  }

  async update(id: string, updates: Partial<PipelineRun>): Promise<PipelineRun | null> {
    const existing = this.data.get(id);
    if (!existing) return null;
    const updated = { ...deepCopy(existing), ...deepCopy(updates), updatedAt: new Date().toISOString() };
    this.data.set(id, updated);
    return deepCopy(updated);
  }

  async list(options?: ListOptions): Promise<PipelineRun[]> {
    const items = [...this.data.values()].reverse();
    return applyListOptions(items.map(deepCopy), options);
  }

  async count(): Promise<number> {
    return this.data.size;
  }
}

class MemoryArtifactStore implements ArtifactStore {
  private data = new Map<string, ArtifactRef>();

  async create(artifact: ArtifactRef): Promise<ArtifactRef> {
    this.data.set(artifact.id, deepCopy(artifact));
    return deepCopy(artifact);
  }

  async getById(id: string): Promise<ArtifactRef | null> {
    const artifact = this.data.get(id);
    return artifact ? deepCopy(artifact) : null;
  }

  async listByPipeline(pipelineId: string, options?: ListOptions): Promise<ArtifactRef[]> {
    const items = [...this.data.values()].filter((a) => a.pipelineId === pipelineId);
    return applyListOptions(items.map(deepCopy), options);
  }
}

class MemoryEventStore implements EventStore {
  private data: DataPlaneEvent[] = [];
  private pipelineIndex = new Map<string, number[]>();

  async create(event: DataPlaneEvent): Promise<DataPlaneEvent> {
    const idx = this.data.length;
    this.data.push(deepCopy(event));
    const indices = this.pipelineIndex.get(event.pipelineId) ?? [];
    indices.push(idx);
    this.pipelineIndex.set(event.pipelineId, indices);
    return deepCopy(event);
  }

  async listByPipeline(
    pipelineId: string,
    options?: ListOptions & { eventTypes?: string[] },
  ): Promise<DataPlaneEvent[]> {
    const indices = this.pipelineIndex.get(pipelineId);
    if (!indices) return [];
    const eventTypes = options?.eventTypes ?? [];
    const items = indices
      .map((i) => this.data[i])
      .filter((e) => eventTypes.length === 0 || eventTypes.includes(e.type));
    return applyListOptions(items.map(deepCopy), options);
  }
}

/** Create a new in-memory store instance. */
export function createMemoryStore(): Store {
  return {
    pipelines: new MemoryPipelineStore(),
    artifacts: new MemoryArtifactStore(),
    events: new MemoryEventStore(),
  };
}
