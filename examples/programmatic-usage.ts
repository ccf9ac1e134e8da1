import {
  CommandSynthesizer,
  FfmpegEncoder,
  convertBook,
  loadConfig,
  parseInput,
  planBook
} from '../src/index.js';

async function example() {
  const parsed = await parseInput('./book.epub');
  const config = loadConfig({ maxChunkChars: 400, gapSeconds: 0.3 });

  const plan = planBook(parsed, config);
  console.log(`Parsed ${plan.chapters.length} chapters from ${parsed.source}`);

  // Two local engines, one per GPU; chapters are spread across them
  const synthesizers = ['cuda:0', 'cuda:1'].map(device => new CommandSynthesizer({
    command: 'my-tts',
    args: ['--device', device, '--wav-out', '-']
  }));

  const result = await convertBook(parsed, {
    synthesizers,
    encoder: new FfmpegEncoder({ ffmpegPath: config.ffmpegPath })
  }, {
    outputPath: './book.m4b',
    config,
    plan,
    onProgress: event => {
      if (event.type === 'chapter') {
        console.log(`Chapter ${event.chapterIndex + 1}/${event.totalChapters}: ${event.title} (${event.duration.toFixed(1)} s)`);
      }
    }
  });

  for (const mark of result.marks) {
    console.log(`${mark.title}: ${mark.start.toFixed(2)}s - ${mark.end.toFixed(2)}s`);
  }
  console.log(`Saved: ${result.outputPath}`);
}

example().catch(console.error);
