import type { AudioSegment, SegmentOwner } from '../types.js';
import { FormatError } from '../errors.js';

export interface AssembleOptions {
  /** Silence inserted between consecutive chunks, in seconds. */
  gapSeconds?: number;
}

export function createSegment(owner: SegmentOwner, samples: Float32Array, sampleRate: number): AudioSegment {
  return { owner, samples, sampleRate, duration: samples.length / sampleRate };
}

/**
 * Concatenates a chapter's chunk segments in order. Sample rates must agree;
 * nothing is resampled, trimmed or cross-faded.
 *
 * @throws FormatError on an empty list or mismatched sample rates
 */
export function assembleChapter(
  chapterIndex: number,
  segments: readonly AudioSegment[],
  options: AssembleOptions = {}
): AudioSegment {
  const first = segments[0];
  if (first === undefined) {
    throw new FormatError(`Chapter ${chapterIndex + 1} has no audio segments to assemble`);
  }

  const sampleRate = first.sampleRate;
  for (const segment of segments) {
    if (segment.sampleRate !== sampleRate) {
      throw new FormatError(
        `Sample rate mismatch in chapter ${chapterIndex + 1}: chunk ${(segment.owner.chunkIndex ?? 0) + 1} is ${segment.sampleRate} Hz, expected ${sampleRate} Hz`
      );
    }
  }

  const gapSamples = Math.round((options.gapSeconds ?? 0) * sampleRate);
  const total = segments.reduce((sum, s) => sum + s.samples.length, 0) + gapSamples * (segments.length - 1);
  const samples = new Float32Array(total);

  let offset = 0;
  segments.forEach((segment, i) => {
    if (i > 0) offset += gapSamples; // already zero-filled
    samples.set(segment.samples, offset);
    offset += segment.samples.length;
  });

  return createSegment({ chapterIndex }, samples, sampleRate);
}
