import type { Chapter, Chunk } from './types.js';
import { ChunkingError } from './errors.js';

// Terminal punctuation, optional closing quotes/brackets, then whitespace
const SENTENCE_BOUNDARY = /(?<=[.!?。！？…]["'”’)\]]*)\s+/;
const CLAUSE_BOUNDARY = /(?<=[,;:，；：])\s+/;

interface Piece {
  text: string;
  /** Joins the previous piece with a space; false after a mid-word cut. */
  spaced: boolean;
  hardSplit: boolean;
}

export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function chunkChapter(chapter: Chapter, maxChars: number): Chunk[] {
  return splitText(chapter.text, maxChars).map((chunk, index) => ({
    ...chunk,
    chapterIndex: chapter.index,
    index
  }));
}

/**
 * Splits text into chunks of at most `maxChars` characters, closing a chunk
 * only at sentence boundaries. Sentences that do not fit on their own are cut
 * at clause boundaries, then at the last space before the limit, and as a last
 * resort exactly at the limit.
 *
 * `joinChunks(splitText(t, n))` always equals `normalizeWhitespace(t)`.
 */
export function splitText(
  text: string,
  maxChars: number
): Array<Omit<Chunk, 'chapterIndex' | 'index'>> {
  if (!Number.isInteger(maxChars) || maxChars < 1) {
    throw new ChunkingError(`Chunk size must be a positive integer, got ${maxChars}`);
  }

  const normalized = normalizeWhitespace(text);
  if (normalized.length === 0) return [];

  const pieces = normalized
    .split(SENTENCE_BOUNDARY)
    .flatMap(sentence => splitSentence(sentence, maxChars));

  const chunks: Array<Omit<Chunk, 'chapterIndex' | 'index'>> = [];
  let current: { text: string; hardSplit: boolean } | null = null;

  for (const piece of pieces) {
    if (current === null) {
      current = { text: piece.text, hardSplit: piece.hardSplit };
      continue;
    }

    const separator = piece.spaced ? ' ' : '';
    if (current.text.length + separator.length + piece.text.length <= maxChars) {
      current.text += separator + piece.text;
      current.hardSplit = current.hardSplit || piece.hardSplit;
    } else {
      chunks.push({ text: current.text, hardSplit: current.hardSplit, midWord: !piece.spaced });
      current = { text: piece.text, hardSplit: piece.hardSplit };
    }
  }

  if (current !== null) {
    chunks.push({ text: current.text, hardSplit: current.hardSplit, midWord: false });
  }

  return chunks;
}

function splitSentence(sentence: string, maxChars: number): Piece[] {
  if (sentence.length <= maxChars) {
    return [{ text: sentence, spaced: true, hardSplit: false }];
  }

  return sentence.split(CLAUSE_BOUNDARY).flatMap(clause => {
    if (clause.length <= maxChars) {
      return [{ text: clause, spaced: true, hardSplit: false }];
    }
    return hardSplit(clause, maxChars);
  });
}

function hardSplit(text: string, maxChars: number): Piece[] {
  const pieces: Piece[] = [];
  let rest = text;
  let spaced = true;

  while (rest.length > maxChars) {
    const cut = rest.lastIndexOf(' ', maxChars);

    if (cut > 0) {
      // The space at the cut becomes the join between the two chunks
      pieces.push({ text: rest.slice(0, cut), spaced, hardSplit: true });
      rest = rest.slice(cut + 1);
      spaced = true;
    } else {
      const size = maxChars > 1 && isHighSurrogate(rest.charCodeAt(maxChars - 1)) ? maxChars - 1 : maxChars;
      pieces.push({ text: rest.slice(0, size), spaced, hardSplit: true });
      rest = rest.slice(size);
      spaced = false;
    }
  }

  pieces.push({ text: rest, spaced, hardSplit: true });
  return pieces;
}

// Keeps surrogate pairs (emoji, rare CJK) whole at exact cuts
function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Reassembles chunk texts, undoing the spaces implied at mid-word cuts. */
export function joinChunks(chunks: ReadonlyArray<Pick<Chunk, 'text' | 'midWord'>>): string {
  let joined = '';
  chunks.forEach((chunk, i) => {
    const previous = chunks[i - 1];
    if (previous === undefined) {
      joined = chunk.text;
    } else {
      joined += (previous.midWord ? '' : ' ') + chunk.text;
    }
  });
  return joined;
}
