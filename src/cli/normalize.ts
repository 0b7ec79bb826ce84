import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readConfig } from '../pipeline/env';
import { FfmpegTranscoder } from '../pipeline/ffmpeg';
import { normalizeSubtitleFile } from '../pipeline/srt';
import { applyLogging, exitWithError } from './common';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('input', { type: 'string', demandOption: true })
    .option('out', { type: 'string', describe: 'Defaults to rewriting the input in place' })
    .parse();

  applyLogging();
  const input = path.resolve(argv.input);
  const out = path.resolve(argv.out ?? input);
  const track = await normalizeSubtitleFile(input, new FfmpegTranscoder(readConfig().ffmpegBin), out);
  console.log(`Normalized ${track.length} cues:`, out);
}

main().catch(exitWithError);
