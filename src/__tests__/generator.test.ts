import * as os from 'os';
import * as path from 'path';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ensureOutputDir, generateFileName, saveChapterWav } from '../generator.js';
import { createSegment } from '../audio/assembler.js';
import { decodeWav } from '../audio/wav.js';

describe('generateFileName', () => {
  it('pads the chapter index so files sort in book order', () => {
    expect(generateFileName(0)).toBe('chapter_0000.wav');
    expect(generateFileName(42)).toBe('chapter_0042.wav');
    expect(generateFileName(12345)).toBe('chapter_12345.wav');
  });
});

describe('saveChapterWav', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'generator-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the chapter as 16-bit WAV and describes it', async () => {
    const outputDir = path.join(dir, 'nested', 'chapters');
    await ensureOutputDir(outputDir);
    const segment = createSegment({ chapterIndex: 7 }, new Float32Array([0.5, -0.5, 0.25, 0]), 8000);

    const audio = await saveChapterWav(segment, 'Seven', { outputDir });

    expect(audio).toEqual({
      index: 7,
      title: 'Seven',
      path: path.join(outputDir, 'chapter_0007.wav'),
      sampleRate: 8000,
      sampleCount: 4,
      duration: 0.0005
    });
    const decoded = decodeWav(await readFile(audio.path));
    expect(Array.from(decoded.samples)).toEqual([0.5, -0.5, 0.25, 0]);
  });
});
