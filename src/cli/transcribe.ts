import fs from 'fs-extra';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readConfig } from '../pipeline/env';
import { serializeSrt, toSegments } from '../pipeline/srt';
import { VERBATIM_PROMPT } from '../pipeline/transcribe';
import { FasterWhisperEngine } from '../pipeline/whisper';
import { applyLogging, exitWithError } from './common';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('audio', { type: 'string', demandOption: true })
    .option('out', { type: 'string' })
    .parse();

  applyLogging();
  const audio = path.resolve(argv.audio);
  const out = path.resolve(argv.out ?? audio.replace(/\.[^.]+$/, '') + '.srt');
  const engine = new FasterWhisperEngine(readConfig().whisper);
  const segments = toSegments(await engine.transcribe(audio, { wordTimestamps: true, verbatimPrompt: VERBATIM_PROMPT }));
  await fs.writeFile(out, serializeSrt(segments));
  console.log(`Wrote ${segments.length} cues:`, out);
}

main().catch(exitWithError);
