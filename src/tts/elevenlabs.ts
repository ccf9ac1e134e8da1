import type { SynthesisResult, Synthesizer, VoiceParams } from '../types.js';
import { decodePcm16 } from '../audio/wav.js';
import { SynthesizerRequestError } from './synthesizer.js';

const API_BASE = 'https://api.elevenlabs.io/v1';
const DEFAULT_MODEL_ID = 'eleven_flash_v2_5';
const DEFAULT_VOICE_ID = 'EXAVITQu4vr4xnSDxMaL';
export const ELEVENLABS_SAMPLE_RATE = 24000;

export interface ElevenLabsOptions {
  apiKey: string;
  fetch?: typeof fetch;
  baseUrl?: string;
}

/**
 * ElevenLabs text-to-speech over HTTP. Audio is requested as raw 16-bit PCM
 * so chunks can be concatenated sample-exactly.
 */
export class ElevenLabsSynthesizer implements Synthesizer {
  readonly name = 'elevenlabs';
  private readonly apiKey: string;
  private readonly fetchImpl: typeof fetch;
  private readonly baseUrl: string;

  constructor(options: ElevenLabsOptions) {
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
    this.baseUrl = options.baseUrl ?? API_BASE;
  }

  async synthesize(text: string, voice: VoiceParams): Promise<SynthesisResult> {
    const voiceId = voice.speaker ?? getDefaultVoiceId();
    const url = `${this.baseUrl}/text-to-speech/${encodeURIComponent(voiceId)}?output_format=pcm_${ELEVENLABS_SAMPLE_RATE}`;

    const body: Record<string, unknown> = {
      text,
      model_id: voice.modelId ?? DEFAULT_MODEL_ID,
      voice_settings: {
        stability: 0.5,
        similarity_boost: 0.75,
      }
    };
    if (voice.language && /^[a-z]{2}$/i.test(voice.language)) {
      body.language_code = voice.language.toLowerCase();
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: {
          'xi-api-key': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body)
      });
    } catch (error) {
      throw new SynthesizerRequestError(`ElevenLabs request failed: ${String(error)}`, { cause: error });
    }

    if (!response.ok) {
      const errorText = await response.text();

      if (response.status === 401) {
        throw new SynthesizerRequestError('Invalid ElevenLabs API key. Check ELEVENLABS_API_KEY in .env', {
          retryable: false,
          status: 401
        });
      }

      if (response.status === 429) {
        const retryAfter = Number.parseInt(response.headers.get('Retry-After') ?? '', 10);
        throw new SynthesizerRequestError(
          `Rate limit exceeded. Retry after ${Number.isNaN(retryAfter) ? 'unknown' : retryAfter} seconds.`,
          { status: 429, retryAfterMs: Number.isNaN(retryAfter) ? undefined : retryAfter * 1000 }
        );
      }

      if (response.status >= 500) {
        throw new SynthesizerRequestError(`ElevenLabs server error: ${response.statusText}`, {
          status: response.status
        });
      }

      throw new SynthesizerRequestError(`ElevenLabs API error: ${response.statusText}. ${errorText}`, {
        retryable: false,
        status: response.status
      });
    }

    const audio = new Uint8Array(await response.arrayBuffer());

    return {
      samples: decodePcm16(audio),
      sampleRate: ELEVENLABS_SAMPLE_RATE
    };
  }
}

export function getDefaultVoiceId(): string {
  return process.env.ELEVENLABS_VOICE_ID || DEFAULT_VOICE_ID;
}

export function getApiKey(): string {
  const apiKey = process.env.ELEVENLABS_API_KEY;

  if (!apiKey) {
    throw new Error(
      'ElevenLabs API key not found. Set ELEVENLABS_API_KEY in .env file.\n' +
      'Get your API key from: https://elevenlabs.io/'
    );
  }

  return apiKey;
}
