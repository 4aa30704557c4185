import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { partPath, splitFile } from '../../src/media/segmenter.js';
import { SplitFailure } from '../../src/utils/errors.js';
import { makeTempDir, patternBytes } from '../helpers/fakes.js';

describe('splitFile', () => {
  let dir: string;

  function writeSource(size: number, name = 'video.mp4'): string {
    const source = path.join(dir, name);
    fs.writeFileSync(source, patternBytes(size));
    return source;
  }

  beforeEach(() => {
    dir = makeTempDir('clipcourier-split-');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it.each([
    [1, 48, 1],
    [47, 48, 1],
    [48, 48, 1],
    [49, 48, 2],
    [96, 48, 2],
    [120, 48, 3],
    [1000, 7, 143],
  ])('splits %i bytes with part size %i into %i parts that rejoin losslessly', async (size, partSize, expected) => {
    const source = writeSource(size);

    const parts = await splitFile(source, partSize);

    expect(parts).toHaveLength(expected);
    expect(parts.map(p => p.index)).toEqual(Array.from({ length: expected }, (_, i) => i + 1));
    expect(parts.every(p => p.size <= partSize)).toBe(true);
    const joined = Buffer.concat(parts.map(p => fs.readFileSync(p.path)));
    expect(joined.equals(patternBytes(size))).toBe(true);
  });

  it('yields no parts for an empty file', async () => {
    const source = writeSource(0);

    expect(await splitFile(source, 48)).toEqual([]);
    expect(fs.readdirSync(dir)).toEqual(['video.mp4']);
  });

  it('names parts after the source with a zero-padded suffix', async () => {
    const source = writeSource(120);

    const parts = await splitFile(source, 48);

    expect(parts).toEqual([
      { path: `${source}.part001`, index: 1, size: 48 },
      { path: `${source}.part002`, index: 2, size: 48 },
      { path: `${source}.part003`, index: 3, size: 24 },
    ]);
    expect(partPath('/tmp/x.mp4', 12)).toBe('/tmp/x.mp4.part012');
  });

  it('leaves the source file untouched', async () => {
    const source = writeSource(100);

    await splitFile(source, 30);

    expect(fs.readFileSync(source).equals(patternBytes(100))).toBe(true);
  });

  it('produces identical parts when run again', async () => {
    const source = writeSource(100);

    const first = (await splitFile(source, 30)).map(p => fs.readFileSync(p.path));
    const second = (await splitFile(source, 30)).map(p => fs.readFileSync(p.path));

    expect(second).toHaveLength(first.length);
    second.forEach((bytes, i) => expect(bytes.equals(first[i])).toBe(true));
  });

  it.each([0, -5, 1.5])('rejects part size %s', async (partSize) => {
    const source = writeSource(10);

    await expect(splitFile(source, partSize)).rejects.toBeInstanceOf(SplitFailure);
  });

  it('fails with SplitFailure when the source is missing', async () => {
    const error = await splitFile(path.join(dir, 'nope.mp4'), 48).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SplitFailure);
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
