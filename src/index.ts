export * from './types.js';
export * from './errors.js';
export { loadConfig, pipelineConfigSchema, type PipelineConfig, type PipelineConfigInput } from './config.js';
export { parseInput } from './parsers/parser.js';
export { parseEPUB, readEPUB } from './parsers/epub-parser.js';
export { parseHTML } from './parsers/html-parser.js';
export { parsePDF } from './parsers/pdf-parser.js';
export { extractChapters } from './extractor.js';
export { chunkChapter, splitText, joinChunks } from './chunker.js';
export { cleanHTMLContent } from './cleaner.js';
export { assembleChapter, createSegment } from './audio/assembler.js';
export { encodeWav, decodeWav } from './audio/wav.js';
export { SynthesisOrchestrator } from './services/orchestrator.js';
export { computeChapterMarks } from './packager/chapter-marks.js';
export { renderFFMetadata } from './packager/ffmetadata.js';
export { FfmpegEncoder, buildFfmpegArgs } from './packager/encoder.js';
export { BookPackager, renderConcatList } from './packager/packager.js';
export {
  CommandSynthesizer,
  ElevenLabsSynthesizer,
  SynthesizerRequestError,
  createSynthesizer,
  getApiKey,
  getDefaultVoiceId
} from './tts/index.js';
export { convertBook, planBook, type BookPlan, type ConvertBookOptions, type ConvertBookResult } from './pipeline.js';
export { getLogger, setLogLevel } from './logger.js';
