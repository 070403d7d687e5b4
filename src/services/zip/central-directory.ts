import type { ByteRangeSource } from '@/adapters/http/range-fetcher';
import { ProbeWindowReader } from '@/adapters/zip/window-reader';
import { CentralDirectoryNotFoundError, DecodeError, InvalidFormatError } from '@/errors';
import type { LocatedCentralDirectory, ProbeWindow } from '@/types/zip';
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_PROBE_STEP } from '@/utils/config';
import { createLogger } from '@/utils/logger';
import { decodeArchive } from './decoder';

const log = createLogger('locator');

/** Local file header magic, `PK` */
export const ZIP_SIGNATURE = [0x50, 0x4b] as const;

export interface LocateOptions {
  /** Bytes added to the backward window on every attempt */
  step?: number;
  maxAttempts?: number;
  /** Called before each window is fetched */
  onProbe?: (window: ProbeWindow) => void;
}

/**
 * Probing(attempt) -> Decoded | Probing(attempt + 1) | Exhausted
 */
export type LocatorState =
  | { kind: 'probing'; attempt: number }
  | { kind: 'decoded'; result: LocatedCentralDirectory }
  | { kind: 'exhausted'; attempts: number; lastError: unknown };

export function hasZipSignature(bytes: Uint8Array): boolean {
  return bytes.byteLength >= ZIP_SIGNATURE.length && ZIP_SIGNATURE.every((byte, i) => bytes[i] === byte);
}

export function probeWindow(contentLength: number, step: number, attempt: number): ProbeWindow {
  return {
    attempt,
    start: Math.max(contentLength - step * attempt, 0),
    end: contentLength - 1,
  };
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Find the trailing region of a remote ZIP that holds a decodable central
 * directory, widening the backward window by `step` bytes per attempt.
 *
 * The search is sequential: one fetch and one decode per attempt. It ends on
 * the first successful decode, after `maxAttempts` windows, or once the window
 * has reached the start of the object, whichever comes first.
 */
export async function locateCentralDirectory(
  source: ByteRangeSource,
  contentLength: number,
  leadingBytes: Uint8Array,
  options: LocateOptions = {}
): Promise<LocatedCentralDirectory> {
  const step = options.step ?? DEFAULT_PROBE_STEP;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  assertPositiveInt('step', step);
  assertPositiveInt('maxAttempts', maxAttempts);
  assertPositiveInt('contentLength', contentLength);

  if (!hasZipSignature(leadingBytes)) {
    throw new InvalidFormatError('This does not appear to be a valid ZIP file.');
  }

  const probe = async (attempt: number): Promise<LocatorState> => {
    const window = probeWindow(contentLength, step, attempt);
    options.onProbe?.(window);
    log.info(`Fetching bytes ${window.start}-${window.end} (Attempt ${attempt})...`);

    try {
      const bytes = await source.fetch(window);
      const reader = new ProbeWindowReader(contentLength, [
        { offset: 0, bytes: leadingBytes },
        { offset: window.start, bytes },
      ]);
      const entries = await decodeArchive(reader);
      return { kind: 'decoded', result: { window, bytes, entries } };
    } catch (error) {
      if (error instanceof DecodeError && error.kind !== 'Other') {
        log.debug(`Attempt ${attempt} failed (${error.kind}). Retrying with larger range.`);
      } else {
        log.warn(`Attempt ${attempt} failed with unexpected error: ${describe(error)}`);
      }

      // A window starting at byte 0 already covers the whole object
      if (attempt >= maxAttempts || window.start === 0) {
        return { kind: 'exhausted', attempts: attempt, lastError: error };
      }
      return { kind: 'probing', attempt: attempt + 1 };
    }
  };

  let state: LocatorState = { kind: 'probing', attempt: 1 };
  while (state.kind === 'probing') {
    state = await probe(state.attempt);
  }

  if (state.kind === 'exhausted') {
    throw new CentralDirectoryNotFoundError(state.attempts, { cause: state.lastError });
  }

  log.info(`Central directory located with ${state.result.entries.length} entries.`);
  return state.result;
}
