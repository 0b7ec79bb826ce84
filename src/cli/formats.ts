import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { readConfig } from '../pipeline/env';
import { describeFormat, resolveFormats } from '../pipeline/formats';
import { createYtDlpClient } from '../pipeline/ytdlp';
import { applyLogging, exitWithError } from './common';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('url', { type: 'string', demandOption: true })
    .option('json', { type: 'boolean', default: false })
    .parse();

  applyLogging();
  const client = await createYtDlpClient(readConfig().ytdlp);
  const formats = resolveFormats(await client.listFormats(argv.url));
  if (argv.json) {
    console.log(JSON.stringify(formats, null, 2));
    return;
  }
  for (const f of formats) console.log(describeFormat(f));
}

main().catch(exitWithError);
