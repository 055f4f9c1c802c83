#!/usr/bin/env node

import { Command } from 'commander';
import { DOWNLOADER_VERSION } from '../core/config/constants.js';
import { toErrorMessage } from '../core/errors.js';
import { registerDownloadCommand, type DownloaderFactory } from './commands/download.js';
import { registerDoctorCommand } from './commands/doctor.js';
import { registerInfoCommand } from './commands/info.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';
import type { BrowserSelector } from '../core/render/browser-selector.js';

export interface CliDeps {
  createDownloader?: DownloaderFactory;
  selector?: BrowserSelector;
}

export function buildProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name('docsnap')
    .description('Download documents as screenshots or extracted text')
    .version(DOWNLOADER_VERSION)
    // keeps `info --json` from being taken as the download flag
    .enablePositionalOptions();

  registerInfoCommand(program);
  registerDoctorCommand(program, deps.selector);
  registerInstallBrowsersCommand(program);
  registerDownloadCommand(program, deps.createDownloader);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Error:', toErrorMessage(error));
    process.exitCode = 1;
  });
}
