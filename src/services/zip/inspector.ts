import { FetchTransport, type RangeTransport } from '@/adapters/http/fetch-transport';
import { RangeFetcher, type RangeProgress } from '@/adapters/http/range-fetcher';
import { InvalidFormatError } from '@/errors';
import type { ProbeWindow, RemoteObject } from '@/types/zip';
import { DEFAULT_LEADING_BYTES } from '@/utils/config';
import { createLogger } from '@/utils/logger';
import { ArchiveStructure } from './archive-structure';
import { hasZipSignature, locateCentralDirectory, type LocateOptions } from './central-directory';

const log = createLogger('inspect');

/**
 * Everything one inspection learned about a remote archive.
 */
export interface InspectionSession extends RemoteObject {
  structure: ArchiveStructure;
  /** Trailing window that held the central directory */
  window: ProbeWindow;
}

export interface InspectOptions extends LocateOptions {
  transport?: RangeTransport;
  /** Size of the leading sample used for the signature check */
  leadingBytes?: number;
  onProgress?: RangeProgress;
}

/**
 * Inspect the structure of a remote ZIP without downloading the whole file.
 */
export async function inspect(location: string, options: InspectOptions = {}): Promise<InspectionSession> {
  const transport = options.transport ?? new FetchTransport();

  log.info(`Fetching metadata to get the file size of ${location}...`);
  const contentLength = await transport.head(location);
  log.info(`File size: ${contentLength} bytes`);

  if (contentLength === 0) {
    throw new InvalidFormatError('Remote object is empty; not a ZIP file.');
  }

  const fetcher = new RangeFetcher(transport, location, {
    contentLength,
    onProgress: options.onProgress,
  });

  log.info('Fetching initial bytes to detect ZIP structure...');
  const leadingSize = Math.min(options.leadingBytes ?? DEFAULT_LEADING_BYTES, contentLength);
  const leading = await fetcher.fetch({ start: 0, end: leadingSize - 1 });
  if (!hasZipSignature(leading)) {
    throw new InvalidFormatError('This does not appear to be a valid ZIP file.');
  }

  log.info('Valid ZIP detected. Attempting to locate the central directory...');
  const located = await locateCentralDirectory(fetcher, contentLength, leading, options);

  return {
    location,
    contentLength,
    structure: new ArchiveStructure(located.entries),
    window: located.window,
  };
}
