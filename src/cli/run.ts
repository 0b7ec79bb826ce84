import readline from 'readline/promises';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createDefaultDeps } from '../pipeline/deps';
import { readConfig } from '../pipeline/env';
import { InvalidVideoUrlError, RunInterruptedError } from '../pipeline/errors';
import { describeFormat } from '../pipeline/formats';
import { isVideoUrl } from '../pipeline/ids';
import { runPipeline } from '../pipeline/run';
import type { StreamDescriptor } from '../pipeline/types';
import { applyLogging, exitWithError } from './common';

// Ctrl+C at a prompt reaches readline, not the process signal handlers
async function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const abort = new AbortController();
  rl.on('SIGINT', () => abort.abort());
  try {
    return (await rl.question(question, { signal: abort.signal })).trim();
  } catch (e: unknown) {
    if (abort.signal.aborted) throw new RunInterruptedError('SIGINT');
    throw e;
  } finally {
    rl.close();
  }
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('url', { type: 'string', describe: 'Video URL (prompted when omitted)' })
    .option('format', { type: 'number', describe: 'Format menu index, 0 = best (prompted when omitted)' })
    .option('output-dir', { type: 'string', describe: 'Override OUTPUT_DIR' })
    .option('lang', { type: 'string', describe: 'Override SUBTITLE_LANG' })
    .option('log-level', { type: 'string' })
    .parse();

  applyLogging({ level: argv['log-level'] });
  const config = readConfig({
    ...process.env,
    ...(argv['output-dir'] ? { OUTPUT_DIR: argv['output-dir'] } : {}),
    ...(argv.lang ? { SUBTITLE_LANG: argv.lang } : {}),
  });

  const url = argv.url ?? (await ask('Enter the YouTube video URL: '));
  if (!isVideoUrl(url)) {
    throw new InvalidVideoUrlError(url);
  }

  const deps = await createDefaultDeps(config);
  const chooseFormat = async (formats: StreamDescriptor[]): Promise<number> => {
    if (argv.format !== undefined) return argv.format;
    console.log('🎞️ Available video formats:');
    for (const f of formats) console.log(describeFormat(f));
    console.log('0 - Automatically pick best available (default)');
    const answer = await ask('📺 Choose a format number (0 for best): ');
    const n = Number(answer || '0');
    return Number.isNaN(n) ? -1 : n;
  };

  const result = await runPipeline(url, { config, deps, chooseFormat });
  if (result.degraded) {
    console.log('⚠️ Audio could not be merged; the output is video-only.');
  }
  console.log(`✅ Done (${result.subtitleSource} subtitles, ${result.segments} cues): ${result.outputPath}`);
}

main().catch(exitWithError);
