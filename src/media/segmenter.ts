import * as fsp from 'fs/promises';
import { SplitFailure, getErrorMessage } from '../utils/errors.js';
import { removeFiles } from './cleanup.js';

export interface FilePart {
  path: string;
  /** 1-based position in the original file */
  index: number;
  size: number;
}

export type Segmenter = (sourcePath: string, maxPartSize: number) => Promise<FilePart[]>;

export function partPath(sourcePath: string, index: number): string {
  return `${sourcePath}.part${String(index).padStart(3, '0')}`;
}

/**
 * Split a file into consecutive parts of at most `maxPartSize` bytes.
 * The source file is left untouched; an empty file yields no parts.
 */
export async function splitFile(sourcePath: string, maxPartSize: number): Promise<FilePart[]> {
  if (!Number.isInteger(maxPartSize) || maxPartSize <= 0) {
    throw new SplitFailure(`Invalid part size: ${maxPartSize}`);
  }

  const parts: FilePart[] = [];
  const written: string[] = [];
  let source: fsp.FileHandle | null = null;

  try {
    source = await fsp.open(sourcePath, 'r');
    const { size } = await source.stat();
    if (size === 0) return parts;

    const buffer = Buffer.alloc(Math.min(maxPartSize, size));
    let position = 0;

    for (;;) {
      const filled = await readWindow(source, buffer, position);
      if (filled === 0) break;

      const index = parts.length + 1;
      const target = partPath(sourcePath, index);
      written.push(target);
      await fsp.writeFile(target, buffer.subarray(0, filled));
      parts.push({ path: target, index, size: filled });

      position += filled;
      if (filled < maxPartSize) break;
    }

    return parts;
  } catch (error) {
    await removeFiles(written);
    throw new SplitFailure(getErrorMessage(error), { cause: error });
  } finally {
    try {
      await source?.close();
    } catch (e) {
      console.warn(`[segmenter] Failed to close ${sourcePath}: ${getErrorMessage(e)}`);
    }
  }
}

async function readWindow(handle: fsp.FileHandle, buffer: Buffer, position: number): Promise<number> {
  let filled = 0;
  while (filled < buffer.length) {
    const { bytesRead } = await handle.read(buffer, filled, buffer.length - filled, position + filled);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return filled;
}
