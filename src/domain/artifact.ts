/**
 * Artifact domain model.
 *
 * Artifacts are produced outputs from jobs, referenced by storage
 * pointers rather than embedded payloads.
 */

/** Artifact storage pointer kinds. */
export type ArtifactPointerKind = 'file' | 'memory' | 'image-registry';

/** Storage pointer for artifact location. */
export interface ArtifactPointer {
  kind: ArtifactPointerKind;
  uri: string;
}

/** What an artifact holds. */
export type ArtifactType = 'log' | 'binary' | 'diff' | 'image' | 'manifest' | 'report';

/** Artifact metadata. */
export interface ArtifactMetadata {
  createdAt: string;
  sizeBytes?: number;
  contentHash?: string;
}

/** Handle to an output produced by a job. Immutable once created. */
export interface ArtifactRef {
  id: string;
  pipelineId: string;
  jobId: string;
  name: string;
  type: ArtifactType;
  pointer: ArtifactPointer;
  metadata: ArtifactMetadata;
}
