export type LogStream = 'metrics' | 'alerts';

export type RotationState = 'active' | 'rotating' | 'archived';

export interface LogFileState {
  stream: LogStream;
  path: string;
  sizeBytes: number;
  lastModified: Date;
  rotationState: RotationState;
}

export interface RotationPolicy {
  /** Milliseconds since last modification after which the file is rotated. */
  maxAge: number;
  /** Size in bytes above which the file is rotated. */
  maxSize: number;
}

export type RotationOutcome =
  | { status: 'not-needed' }
  | { status: 'rotated'; archivePath: string; recovered: boolean };

