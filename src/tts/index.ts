import type { Synthesizer } from '../types.js';
import { CommandSynthesizer, parseCommandLine } from './command.js';
import { ElevenLabsSynthesizer, getApiKey } from './elevenlabs.js';

export type ProviderName = 'elevenlabs' | 'command';

export interface ProviderOptions {
  provider: ProviderName;
  ttsCommand?: string;
}

export function createSynthesizer(options: ProviderOptions): Synthesizer {
  switch (options.provider) {
    case 'elevenlabs':
      return new ElevenLabsSynthesizer({ apiKey: getApiKey() });
    case 'command': {
      const commandLine = options.ttsCommand ?? process.env.CHAPTERCAST_TTS_COMMAND;
      if (!commandLine) {
        throw new Error('The command provider needs --tts-command or CHAPTERCAST_TTS_COMMAND');
      }
      return new CommandSynthesizer(parseCommandLine(commandLine));
    }
  }
}

export { CommandSynthesizer, parseCommandLine } from './command.js';
export { ElevenLabsSynthesizer, getApiKey, getDefaultVoiceId } from './elevenlabs.js';
export { SynthesizerRequestError } from './synthesizer.js';
