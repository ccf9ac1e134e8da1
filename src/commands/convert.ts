import * as path from 'path';
import ora from 'ora';
import { config } from 'dotenv';
import { parseInput, isURL } from '../parsers/parser.js';
import { createSynthesizer } from '../tts/index.js';
import { FfmpegEncoder } from '../packager/encoder.js';
import { convertBook, intermediatesDirFor, planBook, type BookPlan } from '../pipeline.js';
import { loadConfig, parseNumberOption, parsePrecisionOption } from '../config.js';
import { ChaptercastError, ConfigError, SynthesisError, getErrorMessage } from '../errors.js';
import { getLogger, setLogLevel } from '../logger.js';
import { sanitizeOutputPath } from '../validators/path-validator.js';
import { StateManager } from '../services/state-manager.js';
import type { ConvertOptions, ConversionResult, ParsedBook, ProgressEvent } from '../types.js';

config();

const logger = getLogger('convert');

/** Speaking rate used for dry-run length estimates. */
export const CHARS_PER_MINUTE = 150;

export function estimateMinutes(characters: number): number {
  return Math.round((characters / CHARS_PER_MINUTE) * 10) / 10;
}

/** `<input-stem>.m4b` beside a local file; `./<title>.m4b` for a URL. */
export function defaultOutputPath(input: string, title: string): string {
  if (isURL(input)) {
    const safeTitle = title.replace(/[^\p{L}\p{N} _-]+/gu, '').trim().replace(/\s+/g, '_') || 'audiobook';
    return path.resolve(`${safeTitle}.m4b`);
  }
  const resolved = path.resolve(input);
  return path.join(path.dirname(resolved), `${path.basename(resolved, path.extname(resolved))}.m4b`);
}

export function buildDryRunResult(parsed: ParsedBook, plan: BookPlan, outputPath: string): ConversionResult {
  return {
    success: true,
    chapters: plan.chapters.map(ch => ({
      index: ch.index,
      title: ch.title,
      characters: ch.characters,
      chunks: ch.chunks.length,
      estimatedMinutes: estimateMinutes(ch.characters)
    })),
    totalChapters: plan.chapters.length,
    totalCharacters: plan.chapters.reduce((sum, ch) => sum + ch.characters, 0),
    outputPath,
    source: parsed.source,
    type: parsed.type
  };
}

function describeProgress(event: ProgressEvent): string {
  switch (event.type) {
    case 'chunk':
      return `Chapter ${event.chapterIndex + 1}: chunk ${event.chunkIndex + 1}/${event.totalChunks}`;
    case 'chapter':
      return `Chapter ${event.chapterIndex + 1}/${event.totalChapters} ${event.reused ? 'reused' : 'done'}: ${event.title}`;
    case 'packaging':
      return `Encoding ${event.totalChapters} chapters...`;
  }
}

function logCauseChain(error: unknown): void {
  let cause: unknown = error instanceof Error ? error.cause : undefined;
  while (cause !== undefined) {
    logger.debug(`Caused by: ${getErrorMessage(cause)}`);
    cause = cause instanceof Error ? cause.cause : undefined;
  }
}

export async function convertCommand(
  input: string,
  options: ConvertOptions
): Promise<void> {
  const isJsonMode = options.format === 'json';
  if (options.verbose) setLogLevel('debug');

  const spinner = isJsonMode ? null : ora('Initializing...').start();
  let parsed: ParsedBook | null = null;
  let plan: BookPlan | null = null;

  try {
    const pipelineConfig = loadConfig({
      maxChunkChars: parseNumberOption(options.maxChunkChars),
      gapSeconds: parseNumberOption(options.gap),
      bitrate: options.bitrate,
      maxRetries: parseNumberOption(options.retries),
      minChapterLength: parseNumberOption(options.minChapterLength),
      retainIntermediates: Boolean(options.keepWav || options.resume),
      voice: {
        speaker: options.speaker,
        language: options.language,
        instruct: options.instruct,
        device: options.device,
        precision: parsePrecisionOption(options.precision),
        modelId: options.modelId
      }
    });

    const pagesPerChapter = parseNumberOption(options.pagesPerChapter);
    if (pagesPerChapter !== undefined && (!Number.isInteger(pagesPerChapter) || pagesPerChapter < 1)) {
      throw new ConfigError([`pagesPerChapter: expected a positive integer, got "${options.pagesPerChapter}"`]);
    }

    if (spinner) spinner.text = 'Parsing input...';
    parsed = await parseInput(input, { pagesPerChapter });
    plan = planBook(parsed, pipelineConfig);

    const totalChars = plan.chapters.reduce((sum, ch) => sum + ch.characters, 0);
    const outputPath = sanitizeOutputPath(options.output ?? defaultOutputPath(input, options.title ?? plan.book.title));

    if (spinner) spinner.succeed(`Found ${plan.chapters.length} chapters in ${parsed.type.toUpperCase()}`);

    if (options.dryRun) {
      const dryRun = buildDryRunResult(parsed, plan, outputPath);
      if (isJsonMode) {
        console.log(JSON.stringify(dryRun, null, 2));
      } else {
        console.log('\nDry run - no audio generated\n');
        console.log('Chapters detected:');
        for (const ch of dryRun.chapters) {
          console.log(`  ${ch.index + 1}. ${ch.title} (${ch.characters} characters, ${ch.chunks} chunks, ~${ch.estimatedMinutes} min)`);
        }
        console.log(`\nTotal characters: ${totalChars.toLocaleString()}`);
        console.log(`Estimated length: ~${estimateMinutes(totalChars)} min at ${CHARS_PER_MINUTE} characters/minute`);
        console.log(`Output would be written to ${outputPath}`);
      }
      return;
    }

    if (pipelineConfig.retainIntermediates) {
      const stateManager = new StateManager();
      const workDir = intermediatesDirFor(outputPath);

      if (options.force) {
        await stateManager.clear(workDir);
      } else {
        const state = await stateManager.load(workDir);
        if (state && !options.resume) {
          if (spinner) spinner.stop();
          console.log(`\nFound previous conversion state (${state.completedChapters.length}/${state.totalChapters} chapters completed)`);
          console.log('Use --resume to continue or --force to start fresh\n');
          return;
        }
        if (state && options.resume && !isJsonMode) {
          console.log(`\nResuming conversion (${state.completedChapters.length}/${state.totalChapters} chapters already completed)\n`);
        }
      }
    }

    // Only resolve credentials after the dry-run check
    const synthesizer = createSynthesizer({
      provider: options.provider ?? 'elevenlabs',
      ttsCommand: options.ttsCommand
    });
    const encoder = new FfmpegEncoder({ ffmpegPath: pipelineConfig.ffmpegPath });

    if (spinner) spinner.start(`Converting ${plan.chapters.length} chapters`);

    const result = await convertBook(parsed, { synthesizers: [synthesizer], encoder }, {
      outputPath,
      config: pipelineConfig,
      title: options.title,
      author: options.author,
      resume: options.resume,
      plan,
      onProgress: event => {
        if (spinner) spinner.text = describeProgress(event);
      }
    });

    if (spinner) spinner.succeed(`Wrote ${result.outputPath}`);

    if (isJsonMode) {
      const conversionResult: ConversionResult = {
        success: true,
        chapters: plan.chapters.map((ch, i) => ({
          index: ch.index,
          title: ch.title,
          characters: ch.characters,
          chunks: ch.chunks.length,
          start: result.marks[i]?.start,
          end: result.marks[i]?.end
        })),
        totalChapters: plan.chapters.length,
        totalCharacters: totalChars,
        duration: result.duration,
        outputPath: result.outputPath,
        source: parsed.source,
        type: parsed.type
      };
      console.log(JSON.stringify(conversionResult, null, 2));
    } else {
      console.log(`\n✓ ${result.chapters.length} chapters, ${(result.duration / 60).toFixed(1)} min → ${result.outputPath}`);
      for (const mark of result.marks) {
        console.log(`  ${mark.index + 1}. ${mark.title} [${mark.start.toFixed(2)}s - ${mark.end.toFixed(2)}s]`);
      }
      if (result.intermediatesDir) {
        console.log(`\nChapter WAVs kept in ${result.intermediatesDir}`);
      }
    }
  } catch (error) {
    if (spinner) spinner.fail('Conversion failed');
    const errorMsg = getErrorMessage(error);
    logCauseChain(error);

    if (isJsonMode) {
      const errorResult: ConversionResult = {
        success: false,
        chapters: (plan?.chapters ?? []).map(ch => ({
          index: ch.index,
          title: ch.title,
          characters: ch.characters,
          chunks: ch.chunks.length
        })),
        totalChapters: plan?.chapters.length ?? 0,
        totalCharacters: plan?.chapters.reduce((sum, ch) => sum + ch.characters, 0) ?? 0,
        source: parsed?.source ?? input,
        type: parsed?.type ?? 'html',
        error: {
          code: error instanceof ChaptercastError ? error.code : 'UNKNOWN',
          message: errorMsg,
          chapterIndex: error instanceof SynthesisError ? error.chapterIndex : undefined,
          chunkIndex: error instanceof SynthesisError ? error.chunkIndex : undefined
        }
      };
      console.log(JSON.stringify(errorResult, null, 2));
    } else {
      console.error(`\nError: ${errorMsg}`);
    }
    process.exit(1);
  }
}
