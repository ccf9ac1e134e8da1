import * as os from 'os';
import * as path from 'path';
import { mkdir, mkdtemp, rename, rm, stat, writeFile } from 'fs/promises';
import type { BookAudio, ChapterAudio, Encoder } from '../types.js';
import { FormatError, PackagingError, getErrorMessage } from '../errors.js';
import { readWavLayout } from '../audio/wav.js';
import { getLogger } from '../logger.js';
import { computeChapterMarks, totalDuration } from './chapter-marks.js';
import { renderFFMetadata } from './ffmetadata.js';

const logger = getLogger('packager');

export interface PackageOptions {
  outputPath: string;
  title: string;
  author?: string;
  bitrate: string;
}

export interface PackageResult extends BookAudio {
  outputPath: string;
}

/** Hidden sibling of the output the encoder writes to before the final rename. */
export function partialPathFor(outputPath: string): string {
  const dir = path.dirname(outputPath);
  const ext = path.extname(outputPath);
  return path.join(dir, `.${path.basename(outputPath, ext)}.partial${ext}`);
}

/** The concat demuxer needs every chapter WAV in the same PCM layout. */
export async function checkChapterFiles(chapters: readonly ChapterAudio[], sampleRate: number): Promise<void> {
  const layouts = await Promise.all(chapters.map(chapter => readWavLayout(chapter.path)));

  layouts.forEach((layout, i) => {
    if (layout.format !== 1 || layout.channels !== 1 || layout.bitsPerSample !== 16 || layout.sampleRate !== sampleRate) {
      throw new FormatError(
        `Chapter file ${chapters[i]?.path ?? i} is not ${sampleRate} Hz mono 16-bit PCM`
      );
    }
  });
}

/**
 * ffconcat list for the concat demuxer. Chapters are joined by ffmpeg, so
 * the book never exists as one WAV and its length is not bound by RIFF's
 * 32-bit sizes.
 */
export function renderConcatList(paths: readonly string[]): string {
  const lines = paths.map(file => `file '${path.resolve(file).replace(/'/g, "'\\''")}'`);
  return ['ffconcat version 1.0', ...lines, ''].join('\n');
}

/**
 * Produces the final audiobook: lists chapters in book order, derives
 * chapter marks from their durations and hands everything to the encoder.
 *
 * Either a complete, tagged file exists at `outputPath` afterwards or nothing
 * does: the encoder writes to a partial path that is renamed only on success
 * and removed on any failure.
 */
export class BookPackager {
  constructor(private readonly encoder: Encoder) {}

  async package(chapters: readonly ChapterAudio[], options: PackageOptions): Promise<PackageResult> {
    const first = chapters[0];
    if (first === undefined) {
      throw new PackagingError('No chapter audio to package');
    }

    const marks = computeChapterMarks(chapters);
    const duration = totalDuration(marks);
    const outputPath = path.resolve(options.outputPath);
    const partialPath = partialPathFor(outputPath);
    const workDir = await mkdtemp(path.join(os.tmpdir(), 'chaptercast-package-'));

    logger.info(`Packaging ${chapters.length} chapter(s), ${duration.toFixed(1)}s of audio`);

    try {
      await mkdir(path.dirname(outputPath), { recursive: true });

      await checkChapterFiles(chapters, first.sampleRate);
      const inputs = chapters.map(chapter => path.resolve(chapter.path));
      const concatListPath = path.join(workDir, 'chapters.ffconcat');
      await writeFile(concatListPath, renderConcatList(inputs));

      const metadataPath = path.join(workDir, 'chapters.ffmeta');
      await writeFile(metadataPath, renderFFMetadata({ title: options.title, author: options.author }, marks));

      let produced: string;
      try {
        produced = await this.encoder.encode({
          concatListPath,
          inputs,
          metadataPath,
          output: partialPath,
          sampleRate: first.sampleRate,
          bitrate: options.bitrate,
          marks,
          title: options.title,
          author: options.author
        });
      } catch (error) {
        if (error instanceof PackagingError) throw error;
        throw new PackagingError(`Encoder failed: ${getErrorMessage(error)}`, { cause: error });
      }

      const size = await stat(produced).then(s => s.size, () => 0);
      if (size === 0) {
        throw new PackagingError(`Encoder produced no output at ${produced}`);
      }

      await rename(produced, outputPath);
      logger.info(`Audiobook written to ${outputPath}`);

      return { outputPath, chapters: [...chapters], marks, sampleRate: first.sampleRate, duration };
    } catch (error) {
      await rm(partialPath, { force: true });
      throw error;
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
