// src/cli/commands/info.ts
import { Command } from 'commander';
import { loadMetadata } from '../../core/export/metadata.js';

export function registerInfoCommand(program: Command): void {
  program
    .command('info <dir>')
    .description('Show the metadata saved by a previous download')
    .option('--json', 'Print raw JSON', false)
    .action(async (dir: string, options: { json: boolean }) => {
      const metadata = await loadMetadata(dir);
      if (!metadata) {
        console.log(`No metadata found in ${dir}`);
        return;
      }

      if (options.json) {
        console.log(JSON.stringify(metadata, null, 2));
        return;
      }

      console.log(`Title: ${metadata.title}`);
      console.log(`Document ID: ${metadata.doc_id ?? '-'}`);
      console.log(`URL: ${metadata.url}`);
      console.log(`Downloaded: ${metadata.download_date}`);
      console.log(`Downloader version: ${metadata.downloader_version}`);
    });
}
