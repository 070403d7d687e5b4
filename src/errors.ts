/** Stable error codes surfaced by the inspector. */
export type InspectorErrorCode =
  | 'TRANSPORT'
  | 'INVALID_FORMAT'
  | 'CENTRAL_DIRECTORY_NOT_FOUND'
  | 'DECODE'
  | 'SHARD_WRITE'
  | 'MERGE'
  | 'CLEANUP'
  | 'ENTRY_NOT_FOUND'
  | 'FOLDER_NOT_FOUND'
  | 'CONFIG';

export class InspectorError extends Error {
  readonly code: InspectorErrorCode;
  override readonly cause?: unknown;

  constructor(code: InspectorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'InspectorError';
    this.code = code;
    this.cause = options?.cause;
  }

  toJSON(): { name: string; code: InspectorErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/**
 * Network or HTTP failure, including a partial response shorter than the
 * requested range. Never retried by the fetcher itself.
 */
export class TransportError extends InspectorError {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super('TRANSPORT', message, options);
    this.name = 'TransportError';
    this.status = options?.status;
  }
}

export class InvalidFormatError extends InspectorError {
  constructor(message: string) {
    super('INVALID_FORMAT', message);
    this.name = 'InvalidFormatError';
  }
}

export class CentralDirectoryNotFoundError extends InspectorError {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super(
      'CENTRAL_DIRECTORY_NOT_FOUND',
      `Failed to locate central directory after ${attempts} attempt${attempts === 1 ? '' : 's'}`,
      options
    );
    this.name = 'CentralDirectoryNotFoundError';
    this.attempts = attempts;
  }

  override toJSON(): { name: string; code: InspectorErrorCode; message: string; attempts: number } {
    return { ...super.toJSON(), attempts: this.attempts };
  }
}

export type DecodeErrorKind = 'BadMagic' | 'Truncated' | 'Other';

export class DecodeError extends InspectorError {
  readonly kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string, options?: { cause?: unknown }) {
    super('DECODE', message, options);
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

/** Half-open `[start, end)` index range over the entry list. */
export interface ShardRange {
  start: number;
  end: number;
}

export interface ShardFailure {
  range: ShardRange;
  error: Error;
}

/** Aggregate of every shard that failed to write during one fan-out. */
export class ShardWriteError extends InspectorError {
  readonly failures: ShardFailure[];

  constructor(failures: ShardFailure[]) {
    const ranges = failures.map(({ range }) => `${range.start}-${range.end}`).join(', ');
    super('SHARD_WRITE', `Failed to write ${failures.length} report shard(s): ${ranges}`);
    this.name = 'ShardWriteError';
    this.failures = failures;
  }
}

export class MergeError extends InspectorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MERGE', message, options);
    this.name = 'MergeError';
  }
}

export class CleanupError extends InspectorError {
  readonly file: string;

  constructor(file: string, options?: { cause?: unknown }) {
    super('CLEANUP', `Failed to delete report shard ${file}`, options);
    this.name = 'CleanupError';
    this.file = file;
  }
}

export class EntryNotFoundError extends InspectorError {
  constructor(name: string) {
    super('ENTRY_NOT_FOUND', `Entry not found in archive: ${name}`);
    this.name = 'EntryNotFoundError';
  }
}

export class FolderNotFoundError extends InspectorError {
  constructor(path: string) {
    super('FOLDER_NOT_FOUND', `Folder not found in archive: /${path}`);
    this.name = 'FolderNotFoundError';
  }
}

export class ConfigError extends InspectorError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

export function isInspectorError(err: unknown): err is InspectorError {
  return err instanceof InspectorError;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
