export interface Book {
  title: string;
  author?: string;
  language?: string;
  chapters: Chapter[];
}

export interface Chapter {
  index: number;
  title: string;
  text: string;
}

export interface Chunk {
  chapterIndex: number;
  index: number;
  text: string;
  /** Produced by cutting a sentence that did not fit the budget on its own. */
  hardSplit: boolean;
  /** The cut fell inside a word: the next chunk continues without a space. */
  midWord: boolean;
}

export interface SegmentOwner {
  chapterIndex: number;
  chunkIndex?: number;
}

export interface AudioSegment {
  owner: SegmentOwner;
  samples: Float32Array;
  sampleRate: number;
  /** Seconds, always samples.length / sampleRate. */
  duration: number;
}

export interface ChapterMark {
  index: number;
  title: string;
  start: number;
  end: number;
}

/** An assembled chapter spooled to a WAV file. */
export interface ChapterAudio {
  index: number;
  title: string;
  path: string;
  sampleRate: number;
  sampleCount: number;
  duration: number;
}

export interface BookAudio {
  chapters: ChapterAudio[];
  marks: ChapterMark[];
  sampleRate: number;
  duration: number;
}

export interface ParsedSection {
  title?: string;
  html?: string;
  text?: string;
}

export interface ParsedBook {
  title: string;
  author?: string;
  language?: string;
  sections: ParsedSection[];
  source: string;
  type: 'epub' | 'html' | 'pdf';
}

export interface VoiceParams {
  speaker?: string;
  language?: string;
  instruct?: string;
  device?: string;
  precision?: 'bfloat16' | 'float16' | 'float32';
  modelId?: string;
}

export interface SynthesisResult {
  samples: Float32Array;
  sampleRate: number;
}

export interface Synthesizer {
  readonly name: string;
  synthesize(text: string, voice: VoiceParams): Promise<SynthesisResult>;
}

export interface EncodeRequest {
  /** ffmpeg concat list naming the chapter WAVs in book order. */
  concatListPath: string;
  /** The chapter WAVs the concat list names, in the same order. */
  inputs: string[];
  /** FFMETADATA1 file with title/author tags and chapter marks. */
  metadataPath: string;
  output: string;
  sampleRate: number;
  bitrate: string;
  marks: ChapterMark[];
  title: string;
  author?: string;
}

export interface Encoder {
  encode(request: EncodeRequest): Promise<string>;
}

export type ProgressEvent =
  | { type: 'chunk'; chapterIndex: number; chunkIndex: number; totalChunks: number }
  | { type: 'chapter'; chapterIndex: number; totalChapters: number; title: string; duration: number; reused: boolean }
  | { type: 'packaging'; totalChapters: number };

export type OutputFormat = 'text' | 'json';

export interface ConvertOptions {
  output?: string;
  provider?: 'elevenlabs' | 'command';
  ttsCommand?: string;
  speaker?: string;
  language?: string;
  instruct?: string;
  device?: string;
  precision?: string;
  modelId?: string;
  bitrate?: string;
  maxChunkChars?: string;
  gap?: string;
  retries?: string;
  minChapterLength?: string;
  pagesPerChapter?: string;
  title?: string;
  author?: string;
  keepWav?: boolean;
  resume?: boolean;
  force?: boolean;
  dryRun?: boolean;
  format?: OutputFormat;
  verbose?: boolean;
}

export interface ConversionResult {
  success: boolean;
  chapters: {
    index: number;
    title: string;
    characters: number;
    chunks: number;
    start?: number;
    end?: number;
    estimatedMinutes?: number;
  }[];
  totalChapters: number;
  totalCharacters: number;
  duration?: number;
  outputPath?: string;
  source: string;
  type: ParsedBook['type'];
  error?: {
    code: string;
    message: string;
    chapterIndex?: number;
    chunkIndex?: number;
  };
}
