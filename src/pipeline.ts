import * as os from 'os';
import * as path from 'path';
import { mkdtemp, rm } from 'fs/promises';
import type { AudioSegment, Book, ChapterAudio, Chunk, Encoder, ParsedBook, ProgressEvent, Synthesizer } from './types.js';
import type { PipelineConfig } from './config.js';
import { extractChapters } from './extractor.js';
import { chunkChapter } from './chunker.js';
import { assembleChapter } from './audio/assembler.js';
import { readWavLayout } from './audio/wav.js';
import { SynthesisOrchestrator } from './services/orchestrator.js';
import { StateManager, type ConversionState, type RenderSettings } from './services/state-manager.js';
import { BookPackager, type PackageResult } from './packager/packager.js';
import { ensureOutputDir, generateFileName, saveChapterWav } from './generator.js';
import { SynthesisError, getErrorMessage } from './errors.js';
import { getLogger } from './logger.js';

const logger = getLogger('pipeline');

export interface PlannedChapter {
  index: number;
  title: string;
  characters: number;
  chunks: Chunk[];
}

export interface BookPlan {
  book: Book;
  chapters: PlannedChapter[];
}

export interface PipelineDependencies {
  /** One synthesizer per device; chapters are spread across them. */
  synthesizers: Synthesizer[];
  encoder: Encoder;
}

export interface ConvertBookOptions {
  outputPath: string;
  config: PipelineConfig;
  title?: string;
  author?: string;
  /** Reuse chapters recorded in the intermediates directory's state file. */
  resume?: boolean;
  /** Result of an earlier planBook call for the same input and config. */
  plan?: BookPlan;
  onProgress?: (event: ProgressEvent) => void;
}

export interface ConvertBookResult extends PackageResult {
  title: string;
  author?: string;
  intermediatesDir?: string;
  reusedChapters: number[];
}

type ChapterOutcome = { ok: true; segments: AudioSegment[] } | { ok: false; error: unknown };

/** Extracts and chunks a book without synthesizing anything. */
export function planBook(parsed: ParsedBook, config: Pick<PipelineConfig, 'minChapterLength' | 'maxChunkChars'>): BookPlan {
  const book = extractChapters(parsed, { minChapterLength: config.minChapterLength });
  const chapters = book.chapters.map(chapter => ({
    index: chapter.index,
    title: chapter.title,
    characters: chapter.text.length,
    chunks: chunkChapter(chapter, config.maxChunkChars)
  }));
  return { book, chapters };
}

/** The settings a retained chapter must have been rendered with to be reused. */
export function renderSettingsFor(config: PipelineConfig): RenderSettings {
  return {
    voice: config.voice,
    maxChunkChars: config.maxChunkChars,
    gapSeconds: config.gapSeconds,
    minChapterLength: config.minChapterLength
  };
}

/** `<dir>/<stem>_chapters`, where retained chapter WAVs and the state file live. */
export function intermediatesDirFor(outputPath: string): string {
  const resolved = path.resolve(outputPath);
  return path.join(path.dirname(resolved), `${path.basename(resolved, path.extname(resolved))}_chapters`);
}

/**
 * Runs the whole conversion: extract → chunk → synthesize → assemble → package.
 *
 * Chapters are consumed strictly in book order. The first failing chapter
 * stops the run: no further chunk is synthesized and the error is rethrown
 * without an output file being written.
 */
export async function convertBook(
  parsed: ParsedBook,
  deps: PipelineDependencies,
  options: ConvertBookOptions
): Promise<ConvertBookResult> {
  const { config } = options;
  const plan = options.plan ?? planBook(parsed, config);
  const title = options.title ?? plan.book.title;
  const author = options.author ?? plan.book.author;
  const total = plan.chapters.length;

  const retain = config.retainIntermediates;
  const workDir = retain
    ? intermediatesDirFor(options.outputPath)
    : await mkdtemp(path.join(os.tmpdir(), 'chaptercast-'));
  await ensureOutputDir(workDir);
  logger.info(`Chapter audio directory: ${workDir}`);

  const stateManager = new StateManager();
  const state = retain
    ? await loadState(stateManager, workDir, {
      source: parsed.source,
      totalChapters: total,
      settings: renderSettingsFor(config)
    }, options.resume ?? false)
    : null;

  const orchestrator = new SynthesisOrchestrator(deps.synthesizers, {
    voice: config.voice,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    cancelOnFailure: true,
    onChunk: (chapterIndex, chunkIndex, totalChunks) =>
      options.onProgress?.({ type: 'chunk', chapterIndex, chunkIndex, totalChunks })
  });

  try {
    const reused = new Map<number, ChapterAudio>();
    for (const chapter of plan.chapters) {
      const audio = await findReusableChapter(stateManager, state, chapter, workDir);
      if (audio) reused.set(chapter.index, audio);
    }

    // Queue every chapter up front; each device works through its share in order
    const outcomes = new Map<number, Promise<ChapterOutcome>>();
    for (const chapter of plan.chapters) {
      if (reused.has(chapter.index)) continue;
      outcomes.set(
        chapter.index,
        orchestrator.submitChapter(chapter.index, chapter.chunks).then(
          (segments): ChapterOutcome => ({ ok: true, segments }),
          (error: unknown): ChapterOutcome => ({ ok: false, error })
        )
      );
    }

    const chapterAudio: ChapterAudio[] = [];

    for (const chapter of plan.chapters) {
      const previous = reused.get(chapter.index);
      if (previous) {
        logger.info(`Chapter ${chapter.index + 1}/${total} already synthesized, reusing ${previous.path}`);
        chapterAudio.push(previous);
        options.onProgress?.({
          type: 'chapter', chapterIndex: chapter.index, totalChapters: total,
          title: chapter.title, duration: previous.duration, reused: true
        });
        continue;
      }

      logger.info(`Chapter ${chapter.index + 1}/${total} '${chapter.title.slice(0, 40)}' (${chapter.characters} chars, ${chapter.chunks.length} chunks)`);

      const outcome = await outcomes.get(chapter.index);
      if (!outcome || !outcome.ok) {
        // a cancelled chapter reports the failure that cancelled it
        const error = orchestrator.failure ?? outcome?.error ?? new Error(`Chapter ${chapter.index + 1} was never scheduled`);
        if (state) {
          const failed = error instanceof SynthesisError ? plan.chapters[error.chapterIndex] ?? chapter : chapter;
          stateManager.markFailed(state, { index: failed.index, title: failed.title, error: getErrorMessage(error) });
          await stateManager.save(state, workDir);
        }
        throw error;
      }

      const segment = assembleChapter(chapter.index, outcome.segments, { gapSeconds: config.gapSeconds });
      const audio = await saveChapterWav(segment, chapter.title, { outputDir: workDir });
      chapterAudio.push(audio);

      if (state) {
        stateManager.markCompleted(state, {
          index: audio.index,
          file: path.basename(audio.path),
          sampleRate: audio.sampleRate,
          sampleCount: audio.sampleCount
        });
        await stateManager.save(state, workDir);
      }

      logger.info(`  saved ${path.basename(audio.path)} (${audio.duration.toFixed(1)} s)`);
      options.onProgress?.({
        type: 'chapter', chapterIndex: chapter.index, totalChapters: total,
        title: chapter.title, duration: audio.duration, reused: false
      });
    }

    options.onProgress?.({ type: 'packaging', totalChapters: total });

    const packager = new BookPackager(deps.encoder);
    const result = await packager.package(chapterAudio, {
      outputPath: options.outputPath,
      title,
      author,
      bitrate: config.bitrate
    });

    if (state) {
      await stateManager.clear(workDir);
    }

    return {
      ...result,
      title,
      author,
      intermediatesDir: retain ? workDir : undefined,
      reusedChapters: [...reused.keys()]
    };
  } catch (error) {
    // Stop queued and running chapters and let in-flight calls settle before cleanup
    orchestrator.cancelPending();
    await orchestrator.onIdle();
    logger.error(`Conversion failed: ${getErrorMessage(error)}`);
    throw error;
  } finally {
    if (!retain) {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}

async function loadState(
  stateManager: StateManager,
  workDir: string,
  expected: Pick<ConversionState, 'source' | 'totalChapters' | 'settings'>,
  resume: boolean
): Promise<ConversionState> {
  const fresh: ConversionState = {
    ...expected,
    completedChapters: [],
    failedChapters: [],
    timestamp: new Date().toISOString()
  };

  const existing = resume ? await stateManager.load(workDir) : null;
  const usable = existing !== null && stateManager.matches(existing, expected);
  if (existing && !usable) {
    logger.warn('Existing state file does not match current input or settings, starting fresh', {
      stateSource: existing.source,
      stateChapters: existing.totalChapters,
      currentChapters: expected.totalChapters
    });
  }

  const state = existing && usable ? existing : fresh;
  await stateManager.save(state, workDir);
  return state;
}

/**
 * A chapter recorded as completed is reused only when its WAV is still there
 * and holds exactly the audio the state file describes.
 */
async function findReusableChapter(
  stateManager: StateManager,
  state: ConversionState | null,
  chapter: PlannedChapter,
  workDir: string
): Promise<ChapterAudio | null> {
  const completed = stateManager.findCompleted(chapter.index, state);
  if (!completed) return null;

  if (completed.file !== generateFileName(chapter.index)) {
    logger.warn(`State entry for chapter ${chapter.index + 1} names unexpected file ${completed.file}, synthesizing again`);
    return null;
  }

  const filePath = path.join(workDir, completed.file);
  try {
    const layout = await readWavLayout(filePath);
    const intact = layout.format === 1
      && layout.channels === 1
      && layout.bitsPerSample === 16
      && layout.sampleRate === completed.sampleRate
      && layout.dataLength === completed.sampleCount * 2;
    if (!intact) {
      logger.warn(`Retained audio for chapter ${chapter.index + 1} does not match the state file, synthesizing again`);
      return null;
    }
  } catch (error) {
    logger.warn(`Retained audio for chapter ${chapter.index + 1} is unusable, synthesizing again: ${getErrorMessage(error)}`);
    return null;
  }

  return {
    index: chapter.index,
    title: chapter.title,
    path: filePath,
    sampleRate: completed.sampleRate,
    sampleCount: completed.sampleCount,
    duration: completed.sampleCount / completed.sampleRate
  };
}
