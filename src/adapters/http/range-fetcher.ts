import { TransportError } from '@/errors';
import type { ByteRange } from '@/types/zip';
import { createLogger } from '@/utils/logger';
import type { RangeTransport } from './fetch-transport';

const log = createLogger('fetch');

/**
 * Anything that can hand back the bytes of an inclusive range.
 */
export interface ByteRangeSource {
  fetch(range: ByteRange): Promise<Uint8Array>;
}

export type RangeProgress = (range: ByteRange, received: number, declaredTotal: number) => void;

export interface RangeFetcherOptions {
  /** Known object length, used to reject ranges past the last byte */
  contentLength?: number;
  onProgress?: RangeProgress;
}

export function formatRangeHeader({ start, end }: ByteRange): string {
  return `bytes=${start}-${end}`;
}

export function assertValidRange(range: ByteRange, contentLength?: number): void {
  const { start, end } = range;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end)) {
    throw new RangeError(`Byte range bounds must be integers, got ${start}-${end}`);
  }
  if (start < 0 || start > end) {
    throw new RangeError(`Invalid byte range ${start}-${end}`);
  }
  if (contentLength !== undefined && end >= contentLength) {
    throw new RangeError(`Byte range ${start}-${end} ends past the last byte (${contentLength - 1})`);
  }
}

/**
 * Issues one range request per call and returns exactly the requested bytes.
 * Servers that ignore `Range` and send the whole object are accepted; the
 * requested slice is cut out of the full payload.
 */
export class RangeFetcher implements ByteRangeSource {
  constructor(
    private readonly transport: RangeTransport,
    private readonly location: string,
    private readonly options: RangeFetcherOptions = {}
  ) {}

  async fetch(range: ByteRange): Promise<Uint8Array> {
    assertValidRange(range, this.options.contentLength);

    const header = formatRangeHeader(range);
    const expected = range.end - range.start + 1;
    const onProgress = this.options.onProgress;

    log.debug(`Requesting ${header} from ${this.location}`);
    const response = await this.transport.getRange(
      this.location,
      header,
      onProgress ? (received, total) => onProgress(range, received, total) : undefined
    );

    if (response.status === 'partial') {
      if (response.bytes.byteLength < expected) {
        throw new TransportError(
          `Truncated response for ${header}: expected ${expected} bytes, received ${response.bytes.byteLength}`
        );
      }
      return response.bytes.byteLength === expected ? response.bytes : response.bytes.subarray(0, expected);
    }

    // Range ignored: the payload is the whole object
    if (response.bytes.byteLength <= range.end) {
      throw new TransportError(
        `Truncated response for ${header}: full payload has only ${response.bytes.byteLength} bytes`
      );
    }
    log.debug(`Server ignored ${header}; slicing from full payload of ${response.bytes.byteLength} bytes`);
    return response.bytes.subarray(range.start, range.end + 1);
  }
}
