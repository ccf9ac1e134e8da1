import { z } from 'zod';
import { ConfigError } from './errors.js';

export const PRECISIONS = ['bfloat16', 'float16', 'float32'] as const;
export type Precision = (typeof PRECISIONS)[number];

const voiceSchema = z.object({
  speaker: z.string().min(1).optional(),
  language: z.string().min(1).default('Auto'),
  instruct: z.string().optional(),
  device: z.string().min(1).optional(),
  precision: z.enum(PRECISIONS).optional(),
  modelId: z.string().min(1).optional()
});

export const pipelineConfigSchema = z.object({
  maxChunkChars: z.number().int().min(1).default(500),
  gapSeconds: z.number().min(0).max(10).default(0),
  bitrate: z.string().regex(/^\d+k$/, 'must look like "64k"').default('64k'),
  maxRetries: z.number().int().min(0).max(10).default(2),
  retryDelayMs: z.number().int().min(0).default(1000),
  minChapterLength: z.number().int().min(0).default(20),
  retainIntermediates: z.boolean().default(false),
  ffmpegPath: z.string().min(1).default('ffmpeg'),
  voice: voiceSchema.default({})
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
type VoiceInput = z.input<typeof voiceSchema>;

const optionalNumber = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === '' ? undefined : Number(value)));

const optionalString = z
  .string()
  .optional()
  .transform(value => (value === undefined || value.trim() === '' ? undefined : value));

const envSchema = z.object({
  CHAPTERCAST_MAX_CHUNK_CHARS: optionalNumber,
  CHAPTERCAST_GAP_SECONDS: optionalNumber,
  CHAPTERCAST_BITRATE: optionalString,
  CHAPTERCAST_MAX_RETRIES: optionalNumber,
  CHAPTERCAST_RETRY_DELAY_MS: optionalNumber,
  CHAPTERCAST_MIN_CHAPTER_LENGTH: optionalNumber,
  CHAPTERCAST_SPEAKER: optionalString,
  CHAPTERCAST_LANGUAGE: optionalString,
  CHAPTERCAST_DEVICE: optionalString,
  FFMPEG_PATH: optionalString
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Builds the pipeline configuration from defaults, the environment and
 * explicit overrides (highest precedence), validating everything once.
 *
 * @throws ConfigError listing every invalid field
 */
export function loadConfig(
  overrides: PipelineConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): PipelineConfig {
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(formatIssues(parsedEnv.error));
  }
  const fromEnv = parsedEnv.data;
  const voice: VoiceInput = overrides.voice ?? {};

  const merged: PipelineConfigInput = {
    maxChunkChars: overrides.maxChunkChars ?? fromEnv.CHAPTERCAST_MAX_CHUNK_CHARS,
    gapSeconds: overrides.gapSeconds ?? fromEnv.CHAPTERCAST_GAP_SECONDS,
    bitrate: overrides.bitrate ?? fromEnv.CHAPTERCAST_BITRATE,
    maxRetries: overrides.maxRetries ?? fromEnv.CHAPTERCAST_MAX_RETRIES,
    retryDelayMs: overrides.retryDelayMs ?? fromEnv.CHAPTERCAST_RETRY_DELAY_MS,
    minChapterLength: overrides.minChapterLength ?? fromEnv.CHAPTERCAST_MIN_CHAPTER_LENGTH,
    retainIntermediates: overrides.retainIntermediates,
    ffmpegPath: overrides.ffmpegPath ?? fromEnv.FFMPEG_PATH,
    voice: {
      ...voice,
      speaker: voice.speaker ?? fromEnv.CHAPTERCAST_SPEAKER,
      language: voice.language ?? fromEnv.CHAPTERCAST_LANGUAGE,
      device: voice.device ?? fromEnv.CHAPTERCAST_DEVICE
    }
  };

  const result = pipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parses a numeric CLI flag. Invalid input is passed through as NaN so the
 * schema reports it alongside any other problem.
 */
export function parseNumberOption(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  return value.trim() === '' ? Number.NaN : Number(value);
}

export function parsePrecisionOption(value: string | undefined): Precision | undefined {
  if (value === undefined) return undefined;
  const precision = PRECISIONS.find(candidate => candidate === value);
  if (!precision) {
    throw new ConfigError([`voice.precision: expected one of ${PRECISIONS.join(', ')}, got "${value}"`]);
  }
  return precision;
}
