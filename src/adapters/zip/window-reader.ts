/**
 * Bytes known at a fixed offset of the remote object
 */
export interface ByteWindow {
  offset: number;
  bytes: Uint8Array;
}

/**
 * Raised when the decoder asks for bytes that no window holds.
 */
export class WindowReadError extends Error {
  constructor(
    readonly offset: number,
    readonly length: number
  ) {
    super(`Range [${offset}, ${offset + length}) is outside the fetched windows`);
    this.name = 'WindowReadError';
  }
}

/**
 * Custom Reader for unzipit over a sparse view of the remote object.
 *
 * The leading bytes and the fetched trailing window sit at their real offsets
 * and the reported length is the full object length, so central directory
 * offsets resolve without any adjustment. Reads touching bytes outside every
 * window fail with `WindowReadError`, except a read that ends at the last byte:
 * that is the backward end-of-central-directory scan, and its unknown prefix is
 * zero-filled (zeros never form a record signature).
 */
export class ProbeWindowReader {
  private readonly windows: ByteWindow[];

  constructor(
    private readonly length: number,
    windows: ByteWindow[]
  ) {
    this.windows = [...windows].sort((a, b) => a.offset - b.offset);
  }

  static whole(bytes: Uint8Array): ProbeWindowReader {
    return new ProbeWindowReader(bytes.byteLength, [{ offset: 0, bytes }]);
  }

  /**
   * Get the total size of the remote object
   */
  async getLength(): Promise<number> {
    return this.length;
  }

  async read(offset: number, length: number): Promise<Uint8Array> {
    const end = offset + length;
    if (offset < 0 || length < 0 || end > this.length) {
      throw new WindowReadError(offset, length);
    }

    const tailScan = end === this.length;
    const out = new Uint8Array(length);
    // First byte not yet known to be covered
    let cursor = offset;

    for (const window of this.windows) {
      const from = Math.max(offset, window.offset);
      const to = Math.min(end, window.offset + window.bytes.byteLength);
      if (from >= to) continue;

      if (from > cursor && !tailScan) {
        throw new WindowReadError(offset, length);
      }
      out.set(window.bytes.subarray(from - window.offset, to - window.offset), from - offset);
      cursor = Math.max(cursor, to);
    }

    if (cursor < end && !tailScan) {
      throw new WindowReadError(offset, length);
    }
    return out;
  }
}
