import { TransportError } from '@/errors';

export type RangeStatus = 'full' | 'partial';

export interface RangeResponse {
  /** `partial` for 206, `full` when the server ignored the Range header (200) */
  status: RangeStatus;
  bytes: Uint8Array;
  /** Content-Length of the response, or the received length when the header is absent */
  declaredTotal: number;
}

export type TransferProgress = (received: number, declaredTotal: number) => void;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * HTTP capability the inspector consumes: a length probe and byte-range GETs.
 */
export interface RangeTransport {
  head(location: string): Promise<number>;
  getRange(location: string, rangeHeader: string, onProgress?: TransferProgress): Promise<RangeResponse>;
}

function parseContentLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) {
    return undefined;
  }
  const parsed = Number(value.trim());
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Transport backed by the global `fetch`.
 */
export class FetchTransport implements RangeTransport {
  constructor(private readonly fetchImpl: FetchLike = (input, init) => fetch(input, init)) {}

  async head(location: string): Promise<number> {
    let response: Response;
    try {
      response = await this.fetchImpl(location, { method: 'HEAD' });
    } catch (error) {
      throw new TransportError(`Failed to fetch file metadata: ${describe(error)}`, { cause: error });
    }

    if (response.status !== 200) {
      throw new TransportError(`Failed to fetch file metadata. HTTP Status: ${response.status}`, {
        status: response.status,
      });
    }

    const length = parseContentLength(response.headers.get('Content-Length'));
    if (length === undefined) {
      throw new TransportError('File metadata has no usable Content-Length header', { status: response.status });
    }
    return length;
  }

  async getRange(location: string, rangeHeader: string, onProgress?: TransferProgress): Promise<RangeResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(location, { headers: { Range: rangeHeader } });
    } catch (error) {
      throw new TransportError(`Failed to fetch byte range ${rangeHeader}: ${describe(error)}`, { cause: error });
    }

    let status: RangeStatus;
    if (response.status === 206) {
      status = 'partial';
    } else if (response.status === 200) {
      status = 'full';
    } else {
      throw new TransportError(`Failed to fetch byte range ${rangeHeader}. HTTP Status: ${response.status}`, {
        status: response.status,
      });
    }

    const declared = parseContentLength(response.headers.get('Content-Length'));
    const chunks: Uint8Array[] = [];
    let received = 0;

    if (response.body) {
      const reader = response.body.getReader();
      try {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          chunks.push(value);
          received += value.byteLength;
          onProgress?.(received, declared ?? received);
        }
      } catch (error) {
        throw new TransportError(`Connection dropped while reading ${rangeHeader}: ${describe(error)}`, {
          status: response.status,
          cause: error,
        });
      } finally {
        reader.releaseLock();
      }
    }

    const bytes = new Uint8Array(received);
    let offset = 0;
    for (const chunk of chunks) {
      bytes.set(chunk, offset);
      offset += chunk.byteLength;
    }

    return { status, bytes, declaredTotal: declared ?? received };
  }
}
