import * as path from 'path';
import { mkdir, writeFile } from 'fs/promises';
import type { AudioSegment, ChapterAudio } from './types.js';
import { encodeWav } from './audio/wav.js';
import { validatePathWithinDirectory } from './validators/path-validator.js';

export interface GeneratorOptions {
  outputDir: string;
}

/** Writes an assembled chapter as 16-bit mono WAV named by its chapter index. */
export async function saveChapterWav(
  segment: AudioSegment,
  title: string,
  options: GeneratorOptions
): Promise<ChapterAudio> {
  const outputDir = path.resolve(options.outputDir);
  const chapterIndex = segment.owner.chapterIndex;
  const filePath = path.join(outputDir, generateFileName(chapterIndex));

  validatePathWithinDirectory(filePath, outputDir);

  await writeFile(filePath, encodeWav(segment.samples, segment.sampleRate));

  return {
    index: chapterIndex,
    title,
    path: filePath,
    sampleRate: segment.sampleRate,
    sampleCount: segment.samples.length,
    duration: segment.duration
  };
}

export function generateFileName(chapterIndex: number): string {
  return `chapter_${String(chapterIndex).padStart(4, '0')}.wav`;
}

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await mkdir(outputDir, { recursive: true });
}
