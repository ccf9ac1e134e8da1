/**
 * Error types raised by the conversion pipeline.
 *
 * Every error carries a stable `code` so the CLI (and JSON consumers) can tell
 * failures apart without matching on messages.
 */

export type ErrorCode =
  | 'EXTRACTION_FAILED'
  | 'CHUNKING_FAILED'
  | 'SYNTHESIS_FAILED'
  | 'FORMAT_MISMATCH'
  | 'PACKAGING_FAILED'
  | 'INVALID_CONFIG'
  | 'CANCELLED';

export class ChaptercastError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChaptercastError';
    this.code = code;
  }
}

export class ExtractionError extends ChaptercastError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_FAILED', message, options);
    this.name = 'ExtractionError';
  }
}

export class ChunkingError extends ChaptercastError {
  constructor(message: string) {
    super('CHUNKING_FAILED', message);
    this.name = 'ChunkingError';
  }
}

export class SynthesisError extends ChaptercastError {
  readonly chapterIndex: number;
  readonly chunkIndex: number;
  readonly attempts: number;

  constructor(chapterIndex: number, chunkIndex: number, attempts: number, cause: unknown) {
    super(
      'SYNTHESIS_FAILED',
      `Synthesis failed for chapter ${chapterIndex + 1}, chunk ${chunkIndex + 1} after ${attempts} attempt(s): ${getErrorMessage(cause)}`,
      { cause }
    );
    this.name = 'SynthesisError';
    this.chapterIndex = chapterIndex;
    this.chunkIndex = chunkIndex;
    this.attempts = attempts;
  }
}

/** A chapter stopped because another chapter already failed the run. */
export class CancelledError extends ChaptercastError {
  readonly chapterIndex: number;

  constructor(chapterIndex: number) {
    super('CANCELLED', `Chapter ${chapterIndex + 1} was cancelled after an earlier failure`);
    this.name = 'CancelledError';
    this.chapterIndex = chapterIndex;
  }
}

export class FormatError extends ChaptercastError {
  constructor(message: string) {
    super('FORMAT_MISMATCH', message);
    this.name = 'FormatError';
  }
}

export class PackagingError extends ChaptercastError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, options: { exitCode?: number | null; stderr?: string; cause?: unknown } = {}) {
    super('PACKAGING_FAILED', message, { cause: options.cause });
    this.name = 'PackagingError';
    this.exitCode = options.exitCode ?? null;
    this.stderr = options.stderr ?? '';
  }
}

export class ConfigError extends ChaptercastError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('INVALID_CONFIG', `Invalid configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
