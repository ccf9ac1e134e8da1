import { spawn } from 'child_process';
import type { SynthesisResult, Synthesizer, VoiceParams } from '../types.js';
import { decodeWav } from '../audio/wav.js';
import { SynthesizerRequestError } from './synthesizer.js';

export interface CommandSynthesizerOptions {
  command: string;
  args?: string[];
  /** Milliseconds before a single call is killed. */
  timeoutMs?: number;
}

/** Splits a command line on whitespace, honouring single and double quotes. */
export function parseCommandLine(commandLine: string): { command: string; args: string[] } {
  const tokens = [...commandLine.matchAll(/"([^"]*)"|'([^']*)'|(\S+)/g)].map(
    match => match[1] ?? match[2] ?? match[3] ?? ''
  );
  const [command, ...args] = tokens;
  if (!command) {
    throw new Error('TTS command is empty');
  }
  return { command, args };
}

/**
 * Runs a local text-to-speech program once per chunk: the text goes to stdin,
 * a WAV file is expected on stdout (e.g. `piper --model voice.onnx --output_file -`).
 * Voice parameters are exposed through CHAPTERCAST_* environment variables.
 */
export class CommandSynthesizer implements Synthesizer {
  readonly name: string;

  constructor(private readonly options: CommandSynthesizerOptions) {
    this.name = `command:${options.command}`;
  }

  synthesize(text: string, voice: VoiceParams): Promise<SynthesisResult> {
    const { command, args = [], timeoutMs = 10 * 60 * 1000 } = this.options;

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        env: { ...process.env, ...voiceEnvironment(voice) },
        timeout: timeoutMs
      });

      const stdout: Buffer[] = [];
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => stdout.push(data));
      child.stderr.setEncoding('utf8');
      child.stderr.on('data', (data: string) => {
        stderr = (stderr + data).slice(-2000);
      });

      child.on('error', error => {
        reject(new SynthesizerRequestError(`Failed to start ${command}: ${error.message}`, {
          retryable: false,
          cause: error
        }));
      });

      child.on('close', code => {
        if (code !== 0) {
          reject(new SynthesizerRequestError(`${command} exited with code ${code}: ${stderr.trim()}`));
          return;
        }
        try {
          resolve(decodeWav(Buffer.concat(stdout)));
        } catch (error) {
          reject(new SynthesizerRequestError(`${command} did not produce a WAV stream`, { cause: error }));
        }
      });

      // EPIPE when the program exits without reading its input
      child.stdin.on('error', error => {
        stderr += `\nstdin: ${error.message}`;
      });
      child.stdin.end(text, 'utf8');
    });
  }
}

export function voiceEnvironment(voice: VoiceParams): Record<string, string> {
  const env: Record<string, string> = {};
  if (voice.speaker) env.CHAPTERCAST_SPEAKER = voice.speaker;
  if (voice.language) env.CHAPTERCAST_LANGUAGE = voice.language;
  if (voice.instruct) env.CHAPTERCAST_INSTRUCT = voice.instruct;
  if (voice.device) env.CHAPTERCAST_DEVICE = voice.device;
  if (voice.precision) env.CHAPTERCAST_PRECISION = voice.precision;
  if (voice.modelId) env.CHAPTERCAST_MODEL_ID = voice.modelId;
  return env;
}
