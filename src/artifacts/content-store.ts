/**
 * Artifact content stores.
 *
 * Write-once locations for job outputs: logs, diffs, binaries, reports.
 * Writing a name that already exists is an error; content is never
 * replaced once written.
 */

import { createHash } from 'crypto';
import path from 'path';
import fs from 'fs-extra';
import { ArtifactPointer } from '../domain/artifact';

/** Where content was written and what it was. */
export interface StoredContent {
  pointer: ArtifactPointer;
  sizeBytes: number;
  contentHash: string;
}

export interface ArtifactContentStore {
  /** Write content under a pipeline/job-scoped name. */
  write(pipelineId: string, jobId: string, name: string, content: string | Buffer): Promise<StoredContent>;
  /** Copy an existing file into the store. */
  importFile(pipelineId: string, jobId: string, name: string, sourcePath: string): Promise<StoredContent>;
  read(pointer: ArtifactPointer): Promise<Buffer>;
}

export class ArtifactExistsError extends Error {
  constructor(public location: string) {
    super(`Artifact already exists: ${location}`);
    this.name = 'ArtifactExistsError';
  }
}

function sha256(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/** Job ids contain ":" and "+"; keep stored names portable. */
export function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_.+-]/g, '_');
}

export class FileSystemArtifactStore implements ArtifactContentStore {
  constructor(private root: string) {}

  async write(pipelineId: string, jobId: string, name: string, content: string | Buffer): Promise<StoredContent> {
    const buffer = typeof content === 'string' ? Buffer.from(content, 'utf8') : content;
    const target = this.locate(pipelineId, jobId, name);
    await fs.ensureDir(path.dirname(target));
    try {
      await fs.writeFile(target, buffer, { flag: 'wx' });
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'EEXIST') {
        throw new ArtifactExistsError(target);
      }
      throw err;
    }
    return { pointer: { kind: 'file', uri: target }, sizeBytes: buffer.length, contentHash: sha256(buffer) };
  }

  async importFile(pipelineId: string, jobId: string, name: string, sourcePath: string): Promise<StoredContent> {
    return this.write(pipelineId, jobId, name, await fs.readFile(sourcePath));
  }

  async read(pointer: ArtifactPointer): Promise<Buffer> {
    if (pointer.kind !== 'file') {
      throw new Error(`Unsupported artifact pointer kind: ${pointer.kind}`);
    }
    return fs.readFile(pointer.uri);
  }

  private locate(pipelineId: string, jobId: string, name: string): string {
    return path.join(this.root, safeSegment(pipelineId), safeSegment(jobId), safeSegment(name));
  }
}

export class MemoryArtifactStore implements ArtifactContentStore {
  private contents = new Map<string, Buffer>();

  async write(pipelineId: string, jobId: string, name: string, content: string | Buffer): Promise<StoredContent> {
    const buffer = typeof content === 'string' ? Buffer.from(content, 'utf8') : Buffer.from(content);
    const uri = `memory://${safeSegment(pipelineId)}/${safeSegment(jobId)}/${safeSegment(name)}`;
    if (this.contents.has(uri)) {
      throw new ArtifactExistsError(uri);
    }
    this.contents.set(uri, buffer);
    return { pointer: { kind: 'memory', uri }, sizeBytes: buffer.length, contentHash: sha256(buffer) };
  }

  async importFile(pipelineId: string, jobId: string, name: string, sourcePath: string): Promise<StoredContent> {
    return this.write(pipelineId, jobId, name, await fs.readFile(sourcePath));
  }

  async read(pointer: ArtifactPointer): Promise<Buffer> {
    const content = this.contents.get(pointer.uri);
    if (!content) {
      throw new Error(`Artifact not found: ${pointer.uri}`);
    }
    return Buffer.from(content);
  }
}
