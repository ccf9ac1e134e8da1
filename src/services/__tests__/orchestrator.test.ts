import { describe, it, expect, vi } from 'vitest';
import { SynthesisOrchestrator } from '../orchestrator.js';
import { CancelledError, SynthesisError } from '../../errors.js';
import { SynthesizerRequestError } from '../../tts/synthesizer.js';
import type { Chunk, SynthesisResult, Synthesizer, VoiceParams } from '../../types.js';

function chunks(chapterIndex: number, texts: string[]): Chunk[] {
  return texts.map((text, index) => ({ chapterIndex, index, text, hardSplit: false, midWord: false }));
}

/** Returns one sample per character; records every call. */
class FakeSynthesizer implements Synthesizer {
  readonly calls: string[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    readonly name: string,
    private readonly behaviour: (text: string, call: number) => SynthesisResult | Error = text => ({
      samples: new Float32Array(text.length),
      sampleRate: 100
    }),
    private readonly delayMs = 0
  ) {}

  async synthesize(text: string, _voice: VoiceParams): Promise<SynthesisResult> {
    this.calls.push(text);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) await new Promise(resolve => setTimeout(resolve, this.delayMs));
      const outcome = this.behaviour(text, this.calls.length);
      if (outcome instanceof Error) throw outcome;
      return outcome;
    } finally {
      this.active--;
    }
  }
}

/** Holds every call until released. */
class GatedSynthesizer implements Synthesizer {
  readonly calls: string[] = [];
  private readonly gate: Promise<void>;
  release: () => void = () => {};

  constructor(readonly name: string) {
    this.gate = new Promise(resolve => {
      this.release = () => resolve();
    });
  }

  async synthesize(text: string): Promise<SynthesisResult> {
    this.calls.push(text);
    await this.gate;
    return { samples: new Float32Array(1), sampleRate: 100 };
  }
}

const config = { voice: { speaker: 'narrator' }, maxRetries: 2, retryDelayMs: 0 };

describe('SynthesisOrchestrator', () => {
  it('needs at least one synthesizer', () => {
    expect(() => new SynthesisOrchestrator([], config)).toThrow('needs at least one synthesizer');
  });

  it('synthesizes chunks in order and tags segments with their owner', async () => {
    const synth = new FakeSynthesizer('fake');
    const orchestrator = new SynthesisOrchestrator([synth], config);

    const segments = await orchestrator.submitChapter(1, chunks(1, ['aa', 'bbbb', 'c']));

    expect(synth.calls).toEqual(['aa', 'bbbb', 'c']);
    expect(segments.map(s => s.owner)).toEqual([
      { chapterIndex: 1, chunkIndex: 0 },
      { chapterIndex: 1, chunkIndex: 1 },
      { chapterIndex: 1, chunkIndex: 2 }
    ]);
    expect(segments.map(s => s.duration)).toEqual([0.02, 0.04, 0.01]);
  });

  it('passes voice parameters through unchanged', async () => {
    const synth = new FakeSynthesizer('fake');
    const spy = vi.spyOn(synth, 'synthesize');
    const orchestrator = new SynthesisOrchestrator([synth], config);

    await orchestrator.submitChapter(0, chunks(0, ['hello']));

    expect(spy).toHaveBeenCalledWith('hello', { speaker: 'narrator' });
  });

  it('reports chunk progress', async () => {
    const onChunk = vi.fn();
    const orchestrator = new SynthesisOrchestrator([new FakeSynthesizer('fake')], { ...config, onChunk });

    await orchestrator.submitChapter(5, chunks(5, ['a', 'b']));

    expect(onChunk.mock.calls).toEqual([[5, 0, 2], [5, 1, 2]]);
  });

  it('never runs two calls at once on one device', async () => {
    const synth = new FakeSynthesizer('fake', undefined, 5);
    const orchestrator = new SynthesisOrchestrator([synth], config);

    await Promise.all([
      orchestrator.submitChapter(0, chunks(0, ['a', 'b'])),
      orchestrator.submitChapter(1, chunks(1, ['c', 'd'])),
      orchestrator.submitChapter(2, chunks(2, ['e']))
    ]);

    expect(synth.maxActive).toBe(1);
    expect(synth.calls).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('spreads chapters across devices', async () => {
    const first = new FakeSynthesizer('gpu0', undefined, 5);
    const second = new FakeSynthesizer('gpu1', undefined, 5);
    const orchestrator = new SynthesisOrchestrator([first, second], config);

    const results = await Promise.all([
      orchestrator.submitChapter(0, chunks(0, ['a', 'b'])),
      orchestrator.submitChapter(1, chunks(1, ['c', 'd']))
    ]);

    expect(orchestrator.deviceCount).toBe(2);
    expect(first.calls).toEqual(['a', 'b']);
    expect(second.calls).toEqual(['c', 'd']);
    expect(results.map(r => r.length)).toEqual([2, 2]);
  });

  it('retries a failing chunk with the same text', async () => {
    const synth = new FakeSynthesizer('flaky', (text, call) =>
      call === 2 ? new Error('device busy') : { samples: new Float32Array(text.length), sampleRate: 100 }
    );
    const orchestrator = new SynthesisOrchestrator([synth], config);

    const segments = await orchestrator.submitChapter(0, chunks(0, ['one', 'two']));

    expect(synth.calls).toEqual(['one', 'two', 'two']);
    expect(segments).toHaveLength(2);
  });

  it('names the chapter and chunk when retries run out', async () => {
    const synth = new FakeSynthesizer('broken', text =>
      text === 'bad' ? new Error('out of memory') : { samples: new Float32Array(1), sampleRate: 100 }
    );
    const orchestrator = new SynthesisOrchestrator([synth], config);

    const error = await orchestrator.submitChapter(3, chunks(3, ['fine', 'bad', 'never'])).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SynthesisError);
    expect(error).toMatchObject({ chapterIndex: 3, chunkIndex: 1, attempts: 3, code: 'SYNTHESIS_FAILED' });
    expect(error instanceof Error && error.message).toBe(
      'Synthesis failed for chapter 4, chunk 2 after 3 attempt(s): out of memory'
    );
    expect(synth.calls).toEqual(['fine', 'bad', 'bad', 'bad']);
  });

  it('does not retry a non-retryable failure', async () => {
    const synth = new FakeSynthesizer('denied', () => new SynthesizerRequestError('invalid API key', { retryable: false }));
    const orchestrator = new SynthesisOrchestrator([synth], config);

    await expect(orchestrator.submitChapter(0, chunks(0, ['x']))).rejects.toMatchObject({ attempts: 1, chunkIndex: 0 });
    expect(synth.calls).toHaveLength(1);
  });

  it('treats empty audio and invalid sample rates as failures', async () => {
    const empty = new FakeSynthesizer('silent', () => ({ samples: new Float32Array(0), sampleRate: 100 }));
    const badRate = new FakeSynthesizer('odd', () => ({ samples: new Float32Array(3), sampleRate: 0 }));

    await expect(new SynthesisOrchestrator([empty], { ...config, maxRetries: 0 }).submitChapter(0, chunks(0, ['x'])))
      .rejects.toThrow('silent returned no audio');
    await expect(new SynthesisOrchestrator([badRate], { ...config, maxRetries: 0 }).submitChapter(0, chunks(0, ['x'])))
      .rejects.toThrow('odd returned an invalid sample rate: 0');
  });

  it('rejects chapters that have not started when cancelled', async () => {
    const synth = new FakeSynthesizer('slow', undefined, 10);
    const orchestrator = new SynthesisOrchestrator([synth], config);

    const running = orchestrator.submitChapter(0, chunks(0, ['first']));
    const queued = orchestrator.submitChapter(1, chunks(1, ['second']));
    await vi.waitFor(() => expect(synth.calls).toEqual(['first']));

    orchestrator.cancelPending();

    await expect(running).resolves.toHaveLength(1);
    await expect(queued).rejects.toBeInstanceOf(CancelledError);
    expect(synth.calls).toEqual(['first']);
    expect(orchestrator.isCancelled).toBe(true);
  });

  it('keeps going with other chapters after a failure by default', async () => {
    const synth = new FakeSynthesizer('broken', text =>
      text === 'bad' ? new SynthesizerRequestError('model crashed', { retryable: false }) : { samples: new Float32Array(1), sampleRate: 100 }
    );
    const orchestrator = new SynthesisOrchestrator([synth], config);

    const first = orchestrator.submitChapter(0, chunks(0, ['bad']));
    const second = orchestrator.submitChapter(1, chunks(1, ['a', 'b']));

    await expect(first).rejects.toBeInstanceOf(SynthesisError);
    await expect(second).resolves.toHaveLength(2);
    expect(orchestrator.failure).toBeUndefined();
  });

  it('stops every chapter once one of them fails when asked to', async () => {
    const synth = new FakeSynthesizer('broken', text =>
      text === 'bad' ? new SynthesizerRequestError('model crashed', { retryable: false }) : { samples: new Float32Array(1), sampleRate: 100 }
    );
    const orchestrator = new SynthesisOrchestrator([synth], { ...config, cancelOnFailure: true });

    const first = orchestrator.submitChapter(0, chunks(0, ['bad']));
    const second = orchestrator.submitChapter(1, chunks(1, ['a', 'b', 'c']));

    await expect(first).rejects.toMatchObject({ chapterIndex: 0, chunkIndex: 0 });
    await expect(second).rejects.toBeInstanceOf(CancelledError);
    expect(synth.calls).toEqual(['bad']);
    expect(orchestrator.failure).toMatchObject({ chapterIndex: 0, chunkIndex: 0, attempts: 1 });
  });

  it('halts a chapter running on another device before its next chunk', async () => {
    const failing = new FakeSynthesizer('gpu0', () => new SynthesizerRequestError('out of memory', { retryable: false }));
    const waiting = new GatedSynthesizer('gpu1');
    const orchestrator = new SynthesisOrchestrator([failing, waiting], { ...config, cancelOnFailure: true });

    const first = orchestrator.submitChapter(0, chunks(0, ['x']));
    const second = orchestrator.submitChapter(1, chunks(1, ['a', 'b', 'c']));

    await expect(first).rejects.toBeInstanceOf(SynthesisError);
    waiting.release();

    await expect(second).rejects.toBeInstanceOf(CancelledError);
    expect(waiting.calls).toEqual(['a']);
  });

  it('does not retry once cancelled', async () => {
    const synth = new FakeSynthesizer('flaky', () => new Error('device busy'));
    const orchestrator = new SynthesisOrchestrator([synth], { ...config, maxRetries: 5, retryDelayMs: 200 });
    const running = orchestrator.submitChapter(0, chunks(0, ['x']));
    await vi.waitFor(() => expect(synth.calls).toEqual(['x']));

    orchestrator.cancelPending();

    await expect(running).rejects.toBeInstanceOf(CancelledError);
    expect(synth.calls).toEqual(['x']);
  });
});
