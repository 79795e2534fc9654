import fs from 'node:fs';
import { MAX_PROGRAM_SIZE } from '@core/bus/memory';

export type RomLoadResult =
  | { status: 'success'; size: number }
  | { status: 'rom-not-found'; path: string }
  | { status: 'rom-open-failed'; path: string; message: string }
  | { status: 'rom-read-failed'; path: string; message: string }
  | { status: 'rom-exceeds-memory'; size: number; limit: number };

export type RomLoadError = Exclude<RomLoadResult, { status: 'success' }>;

// Result of reading a ROM file: the bytes, or the reason they are unavailable.
export type RomReadResult = { status: 'success'; bytes: Uint8Array } | RomLoadError;

export type RomReader = (path: string) => RomReadResult;

const errnoCode = (e: unknown): string | undefined =>
  (e instanceof Error && 'code' in e && typeof e.code === 'string') ? e.code : undefined;

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e));

export function checkRomSize(size: number): RomLoadError | null {
  if (size > MAX_PROGRAM_SIZE) return { status: 'rom-exceeds-memory', size, limit: MAX_PROGRAM_SIZE };
  return null;
}

function closeFd(fd: number): boolean {
  try {
    fs.closeSync(fd);
    return true;
  } catch {
    return false;
  }
}

// Reads a whole ROM file. The size is checked against the program region
// before any byte is read, so an oversized ROM is never partially loaded.
export const readRomFile: RomReader = (path) => {
  let fd: number;
  try {
    fd = fs.openSync(path, 'r');
  } catch (e) {
    const code = errnoCode(e);
    if (code === 'ENOENT' || code === 'ENOTDIR') return { status: 'rom-not-found', path };
    return { status: 'rom-open-failed', path, message: errorMessage(e) };
  }

  try {
    const st = fs.fstatSync(fd);
    if (!st.isFile()) return { status: 'rom-not-found', path };
    const tooLarge = checkRomSize(st.size);
    if (tooLarge) return tooLarge;

    const bytes = new Uint8Array(st.size);
    let offset = 0;
    while (offset < bytes.length) {
      const n = fs.readSync(fd, bytes, offset, bytes.length - offset, offset);
      if (n === 0) break;
      offset += n;
    }
    if (offset !== bytes.length) {
      return { status: 'rom-read-failed', path, message: `read ${offset} of ${bytes.length} bytes` };
    }
    return { status: 'success', bytes };
  } catch (e) {
    return { status: 'rom-read-failed', path, message: errorMessage(e) };
  } finally {
    closeFd(fd);
  }
};
