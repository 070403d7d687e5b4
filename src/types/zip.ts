/**
 * Remote object being inspected.
 * The length is known only after the metadata probe and never changes afterwards.
 */
export interface RemoteObject {
  /** URL of the ZIP archive */
  location: string;
  /** Total size in bytes, from the HEAD response */
  contentLength: number;
}

/**
 * Inclusive byte range in remote-object space, as sent in a `Range` header.
 */
export interface ByteRange {
  start: number;
  end: number;
}

/**
 * Individual entry listed in the central directory
 */
export interface ArchiveEntry {
  /** Path within the ZIP, unique per archive */
  name: string;
  /** Uncompressed size in bytes */
  size: number;
}

/**
 * Byte range requested during one locate attempt.
 * `end` is always the last byte of the object; only `start` moves.
 */
export interface ProbeWindow extends ByteRange {
  attempt: number;
}

/**
 * Result of a successful central directory search
 */
export interface LocatedCentralDirectory {
  window: ProbeWindow;
  /** Bytes of the trailing window that decoded */
  bytes: Uint8Array;
  /** Entries in central directory order */
  entries: ArchiveEntry[];
}
