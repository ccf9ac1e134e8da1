import PQueue from 'p-queue';
import type { AudioSegment, Chunk, Synthesizer, VoiceParams } from '../types.js';
import { createSegment } from '../audio/assembler.js';
import { CancelledError, SynthesisError, getErrorMessage } from '../errors.js';
import { getLogger } from '../logger.js';
import { RetryExhaustedError, RetryPolicy } from './retry.js';

const logger = getLogger('orchestrator');

export interface OrchestratorConfig {
  voice: VoiceParams;
  maxRetries: number;
  retryDelayMs: number;
  /** Cancel all remaining work as soon as any chapter fails. */
  cancelOnFailure?: boolean;
  onChunk?: (chapterIndex: number, chunkIndex: number, totalChunks: number) => void;
}

interface DeviceLane {
  synthesizer: Synthesizer;
  queue: PQueue;
}

/**
 * Drives synthesis chunk by chunk. Each synthesizer represents one device and
 * owns a single-worker queue: a chapter is one job on one lane, so its chunks
 * always run in order on the same synthesizer, which keeps any state the
 * synthesizer carries between calls consistent.
 *
 * A failed chapter leaves its siblings alone unless `cancelOnFailure` is set.
 * Once cancelled, chapters still queued reject with a CancelledError as soon
 * as they start, and running chapters stop before their next chunk.
 */
export class SynthesisOrchestrator {
  private readonly lanes: DeviceLane[];
  private readonly retry: RetryPolicy;
  private cancelled = false;
  private firstFailure: SynthesisError | undefined;

  constructor(synthesizers: Synthesizer[], private readonly config: OrchestratorConfig) {
    if (synthesizers.length === 0) {
      throw new Error('SynthesisOrchestrator needs at least one synthesizer');
    }
    this.lanes = synthesizers.map(synthesizer => ({
      synthesizer,
      queue: new PQueue({ concurrency: 1 })
    }));
    this.retry = new RetryPolicy({
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryDelayMs
    });
  }

  /**
   * Queues a chapter on the least busy device. Resolves with one segment per
   * chunk, in chunk order, or rejects with a SynthesisError naming the chunk.
   */
  submitChapter(chapterIndex: number, chunks: readonly Chunk[]): Promise<AudioSegment[]> {
    const lane = this.pickLane();
    return lane.queue.add(async () => {
      try {
        return await this.synthesizeChapter(lane.synthesizer, chapterIndex, chunks);
      } catch (error) {
        if (error instanceof SynthesisError && this.config.cancelOnFailure && !this.cancelled) {
          this.firstFailure = error;
          logger.warn(`Chapter ${chapterIndex + 1} failed, cancelling remaining synthesis`);
          this.cancelPending();
        }
        throw error;
      }
    }, { throwOnTimeout: true });
  }

  /** Synthesizes a chapter right away on the given synthesizer, bypassing the queues. */
  async synthesizeChapter(
    synthesizer: Synthesizer,
    chapterIndex: number,
    chunks: readonly Chunk[]
  ): Promise<AudioSegment[]> {
    const segments: AudioSegment[] = [];

    for (const chunk of chunks) {
      if (this.cancelled) throw new CancelledError(chapterIndex);
      segments.push(await this.synthesizeChunk(synthesizer, chapterIndex, chunk));
      this.config.onChunk?.(chapterIndex, chunk.index, chunks.length);
    }

    return segments;
  }

  /**
   * Stops all remaining work. Nothing new reaches a synthesizer afterwards;
   * calls already in flight finish and are discarded.
   */
  cancelPending(): void {
    this.cancelled = true;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** The failure that cancelled the run, if any. */
  get failure(): SynthesisError | undefined {
    return this.firstFailure;
  }

  async onIdle(): Promise<void> {
    await Promise.all(this.lanes.map(lane => lane.queue.onIdle()));
  }

  get deviceCount(): number {
    return this.lanes.length;
  }

  private async synthesizeChunk(
    synthesizer: Synthesizer,
    chapterIndex: number,
    chunk: Chunk
  ): Promise<AudioSegment> {
    logger.debug(`Chapter ${chapterIndex + 1} chunk ${chunk.index + 1}: ${chunk.text.length} chars`, {
      synthesizer: synthesizer.name
    });

    try {
      return await this.retry.execute(
        async () => {
          if (this.cancelled) throw new CancelledError(chapterIndex);
          const result = await synthesizer.synthesize(chunk.text, this.config.voice);
          if (!Number.isInteger(result.sampleRate) || result.sampleRate <= 0) {
            throw new Error(`${synthesizer.name} returned an invalid sample rate: ${result.sampleRate}`);
          }
          if (result.samples.length === 0) {
            throw new Error(`${synthesizer.name} returned no audio`);
          }
          return createSegment({ chapterIndex, chunkIndex: chunk.index }, result.samples, result.sampleRate);
        },
        (attempt, delayMs, error) => {
          logger.warn(
            `Retry ${attempt}/${this.config.maxRetries} for chapter ${chapterIndex + 1} chunk ${chunk.index + 1} in ${delayMs}ms: ${getErrorMessage(error)}`
          );
        }
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError && error.cause instanceof CancelledError) {
        throw error.cause;
      }
      if (error instanceof RetryExhaustedError) {
        throw new SynthesisError(chapterIndex, chunk.index, error.attempts, error.cause);
      }
      throw new SynthesisError(chapterIndex, chunk.index, 1, error);
    }
  }

  private pickLane(): DeviceLane {
    let best = this.lanes[0];
    for (const lane of this.lanes) {
      if (best === undefined || lane.queue.size + lane.queue.pending < best.queue.size + best.queue.pending) {
        best = lane;
      }
    }
    if (best === undefined) {
      throw new Error('No synthesis device available');
    }
    return best;
  }
}
