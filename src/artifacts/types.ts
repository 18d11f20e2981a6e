export type ArtifactKind = 'chart' | 'csv' | 'pdf';

/**
 * A generated file whose write has been confirmed durable.
 * Timestamps are ISO 8601 so artifacts serialize into tool messages unchanged.
 */
export interface Artifact {
  kind: ArtifactKind;
  fileName: string;
  /** Absolute path on the local filesystem */
  location: string;
  /** Download URL handed to the file-serving collaborator */
  url: string;
  /** Call id whose execution produced the file */
  callId: string;
  createdAt: string;
  expiresAt: string;
}
