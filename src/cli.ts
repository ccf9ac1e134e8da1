#!/usr/bin/env node
import { Command, Option } from 'commander';
import { convertCommand } from './commands/convert.js';
import { PRECISIONS } from './config.js';

const program = new Command();

program
  .name('chaptercast')
  .description('Convert EPUB, HTML and PDF books into chaptered M4B audiobooks')
  .version('1.0.0');

program
  .command('convert')
  .description('Synthesize a book and package it as a single chaptered audio file')
  .argument('<input>', 'EPUB, HTML or PDF file path, or an http(s) URL')
  .option('-o, --output <file>', 'Output .m4b file (default: <input>.m4b)')
  .addOption(new Option('--provider <name>', 'Text-to-speech provider').choices(['elevenlabs', 'command']).default('elevenlabs'))
  .option('--tts-command <cmd>', 'Program that reads text on stdin and writes WAV to stdout (command provider)')
  .option('-s, --speaker <name>', 'Speaker or voice ID')
  .option('--language <name>', 'Synthesis language')
  .option('--instruct <text>', 'Style instruction passed to the synthesizer')
  .option('--device <name>', 'Device the synthesizer runs on')
  .addOption(new Option('--precision <dtype>', 'Model precision').choices([...PRECISIONS]))
  .option('--model-id <id>', 'Synthesizer model ID')
  .option('--bitrate <rate>', 'AAC bitrate, e.g. 64k')
  .option('--max-chunk-chars <number>', 'Maximum characters per synthesis call')
  .option('--gap <seconds>', 'Silence inserted between chunks of a chapter')
  .option('--retries <number>', 'Retries per chunk on transient failures')
  .option('--min-chapter-length <number>', 'Skip sections with fewer characters')
  .option('-p, --pages-per-chapter <number>', 'Pages per chapter for PDFs without an outline', '10')
  .option('--title <title>', 'Override the book title')
  .option('--author <author>', 'Override the book author')
  .option('--keep-wav', 'Keep per-chapter WAV files next to the output')
  .option('--resume', 'Reuse chapters completed by a previous run (implies --keep-wav)')
  .option('--force', 'Ignore previous state and start fresh')
  .option('--dry-run', 'Preview chapters and chunking without synthesizing')
  .addOption(new Option('--format <type>', 'Output format').choices(['text', 'json']).default('text'))
  .option('-v, --verbose', 'Debug logging')
  .action(convertCommand);

program.parse();
