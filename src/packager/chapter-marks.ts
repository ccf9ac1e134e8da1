import type { ChapterMark } from '../types.js';
import { FormatError } from '../errors.js';

export interface MarkSource {
  index: number;
  title: string;
  sampleRate: number;
  sampleCount: number;
}

/**
 * Lays chapters end to end: each starts where the previous one ended, the
 * first at 0. Positions come from cumulative sample counts, so chapter i's
 * end and chapter i+1's start are the same number.
 *
 * @throws FormatError when chapters disagree on sample rate
 */
export function computeChapterMarks(chapters: readonly MarkSource[]): ChapterMark[] {
  const marks: ChapterMark[] = [];
  const sampleRate = chapters[0]?.sampleRate;
  let cursor = 0;

  for (const chapter of chapters) {
    if (chapter.sampleRate !== sampleRate) {
      throw new FormatError(
        `Sample rate mismatch: chapter ${chapter.index + 1} is ${chapter.sampleRate} Hz, expected ${sampleRate} Hz`
      );
    }

    const next = cursor + chapter.sampleCount;
    marks.push({
      index: chapter.index,
      title: chapter.title,
      start: cursor / chapter.sampleRate,
      end: next / chapter.sampleRate
    });
    cursor = next;
  }

  return marks;
}

export function totalDuration(marks: readonly ChapterMark[]): number {
  return marks.at(-1)?.end ?? 0;
}
