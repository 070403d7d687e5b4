import { unzipRaw } from 'unzipit';
import { WindowReadError, type ProbeWindowReader } from '@/adapters/zip/window-reader';
import { DecodeError } from '@/errors';
import type { ArchiveEntry } from '@/types/zip';

const BAD_MAGIC_PATTERN = /signature|end of central directory/i;

/**
 * Sort a decoder failure into the kinds the locator reacts to.
 * Reads past the fetched windows mean the central directory is not fully in view yet.
 */
export function classifyDecodeFailure(error: unknown): DecodeError {
  if (error instanceof DecodeError) {
    return error;
  }
  if (error instanceof WindowReadError) {
    return new DecodeError('Truncated', `Central directory is truncated: ${error.message}`, { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  if (BAD_MAGIC_PATTERN.test(message)) {
    return new DecodeError('BadMagic', `Not a complete archive structure: ${message}`, { cause: error });
  }
  return new DecodeError('Other', `Failed to decode archive structure: ${message}`, { cause: error });
}

/**
 * Decode the central directory visible through the reader.
 * Entries come back in central directory order, directories included.
 */
export async function decodeArchive(reader: ProbeWindowReader): Promise<ArchiveEntry[]> {
  try {
    const { entries } = await unzipRaw(reader);
    return entries.map((entry) => ({ name: entry.name, size: entry.size }));
  } catch (error) {
    throw classifyDecodeFailure(error);
  }
}
