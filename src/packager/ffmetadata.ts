import type { ChapterMark } from '../types.js';

export interface BookTags {
  title: string;
  author?: string;
}

/** Escapes a value for ffmpeg's FFMETADATA1 format. */
export function escapeMetadataValue(value: string): string {
  return value.replace(/[=;#\\\n]/g, ch => `\\${ch}`);
}

export function toMilliseconds(seconds: number): number {
  return Math.round(seconds * 1000);
}

/**
 * Renders book tags and chapter marks as an FFMETADATA1 document, the input
 * ffmpeg reads with `-map_metadata`/`-map_chapters`.
 */
export function renderFFMetadata(tags: BookTags, marks: readonly ChapterMark[]): string {
  const lines = [';FFMETADATA1', `title=${escapeMetadataValue(tags.title)}`, `album=${escapeMetadataValue(tags.title)}`];

  if (tags.author) {
    lines.push(`artist=${escapeMetadataValue(tags.author)}`);
    lines.push(`album_artist=${escapeMetadataValue(tags.author)}`);
  }
  lines.push('genre=Audiobook', '');

  for (const mark of marks) {
    lines.push(
      '[CHAPTER]',
      'TIMEBASE=1/1000',
      `START=${toMilliseconds(mark.start)}`,
      `END=${toMilliseconds(mark.end)}`,
      `title=${escapeMetadataValue(mark.title)}`,
      ''
    );
  }

  return lines.join('\n');
}
