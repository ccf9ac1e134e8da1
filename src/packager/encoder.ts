import { spawn } from 'child_process';
import type { EncodeRequest, Encoder } from '../types.js';
import { PackagingError } from '../errors.js';
import { getLogger } from '../logger.js';

const logger = getLogger('encoder');

const STDERR_TAIL_CHARS = 4000;

export interface FfmpegEncoderOptions {
  ffmpegPath?: string;
}

export function buildFfmpegArgs(request: EncodeRequest): string[] {
  return [
    '-y',
    '-hide_banner',
    '-loglevel', 'error',
    // absolute chapter paths in the list need -safe 0
    '-f', 'concat',
    '-safe', '0',
    '-i', request.concatListPath,
    '-i', request.metadataPath,
    '-map', '0:a',
    '-map_metadata', '1',
    '-map_chapters', '1',
    '-c:a', 'aac',
    '-b:a', request.bitrate,
    '-ar', String(request.sampleRate),
    '-movflags', '+faststart',
    // explicit muxer: the output is a temporary name
    '-f', 'ipod',
    request.output
  ];
}

/**
 * Joins the chapter WAVs and encodes them to AAC in an MP4 (m4b) container
 * with chapters and tags taken from the FFMETADATA file.
 */
export class FfmpegEncoder implements Encoder {
  private readonly ffmpegPath: string;

  constructor(options: FfmpegEncoderOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
  }

  encode(request: EncodeRequest): Promise<string> {
    const args = buildFfmpegArgs(request);
    logger.info(`Running: ${this.ffmpegPath} ${args.join(' ')}`);

    return new Promise((resolve, reject) => {
      const child = spawn(this.ffmpegPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';

      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (data: string) => {
        stderr = (stderr + data).slice(-STDERR_TAIL_CHARS);
      });

      child.on('error', error => {
        reject(new PackagingError(`Failed to start encoder "${this.ffmpegPath}": ${error.message}`, { cause: error }));
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve(request.output);
          return;
        }
        logger.error(`Encoder stderr:\n${stderr.trim()}`);
        const reason = code === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${code}`;
        reject(new PackagingError(`Encoder ${reason}`, { exitCode: code, stderr }));
      });
    });
  }
}
