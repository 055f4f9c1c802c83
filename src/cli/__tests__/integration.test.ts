import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildProgram, runCli } from '../index.js';
import type { DownloaderFactory } from '../commands/download.js';
import { createDocumentInfo } from '../../core/info/extractor.js';
import { buildMetadata, saveMetadata } from '../../core/export/metadata.js';
import { ErrorCode } from '../../core/errors.js';
import type { DocumentDownloader } from '../../core/orchestrator.js';
import type { DownloadReport } from '../../core/types/index.js';

const mockExecSync = jest.fn<(command: string, options?: unknown) => unknown>();

jest.mock('child_process', () => ({
  ...jest.requireActual<typeof import('child_process')>('child_process'),
  execSync: (command: string, options?: unknown) => mockExecSync(command, options),
}));

const URL = 'https://www.scribd.com/document/123456/example';

const exhausted: DownloadReport = {
  succeeded: false,
  strategyUsed: null,
  outputPath: null,
  attempts: [],
  document: null,
  metadataPath: null,
  error: { code: ErrorCode.STRATEGIES_EXHAUSTED, message: 'No retrieval strategy succeeded' },
};

describe('CLI integration', () => {
  let outputDir: string;
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;
  let download: jest.Mock<DocumentDownloader['download']>;
  let factory: jest.Mock<DownloaderFactory>;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsnap-int-'));
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    download = jest.fn<DocumentDownloader['download']>(async () => exhausted);
    factory = jest.fn<DownloaderFactory>(() => ({
      download,
      close: async () => undefined,
    }));
    mockExecSync.mockReset();
    process.exitCode = undefined;
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('shows the download usage and every command in help', () => {
    const help = buildProgram().helpInformation();

    expect(help).toContain('Usage: docsnap');
    expect(help).toContain('<url>');
    expect(help).toContain('info');
    expect(help).toContain('doctor');
    expect(help).toContain('install-browsers');
  });

  it('reports the downloader version', () => {
    expect(buildProgram().version()).toBe('1.0.0');
  });

  it('runs a download with the parsed flags', async () => {
    const program = buildProgram({ createDownloader: factory });

    await program.parseAsync([
      'node', 'docsnap', URL,
      '-o', outputDir,
      '--browser', 'edge',
      '--max-pages', '3',
      '--strict',
    ]);

    expect(factory).toHaveBeenCalledWith(expect.objectContaining({ browserType: 'edge', maxPages: 3 }));
    expect(download).toHaveBeenCalledWith(URL, { outputDir });
    expect(process.exitCode).toBe(1);
  });

  it('rejects an unknown browser before downloading', async () => {
    const program = buildProgram({ createDownloader: factory })
      .exitOverride()
      .configureOutput({ writeErr: () => undefined });

    await expect(program.parseAsync(['node', 'docsnap', URL, '--browser', 'firefox']))
      .rejects.toMatchObject({ code: 'commander.invalidArgument' });
    expect(factory).not.toHaveBeenCalled();
  });

  it('routes info --json to the info command', async () => {
    const info = createDocumentInfo('Example Doc', URL);
    const when = new Date('2024-01-02T03:04:05.000Z');
    await saveMetadata(info, outputDir, when);
    const program = buildProgram({ createDownloader: factory });

    await program.parseAsync(['node', 'docsnap', 'info', outputDir, '--json']);

    expect(logSpy).toHaveBeenCalledWith(JSON.stringify(buildMetadata(info, when), null, 2));
    expect(factory).not.toHaveBeenCalled();
  });

  it('installs the bundled chromium', async () => {
    mockExecSync.mockImplementation(() => Buffer.from(''));

    await buildProgram().parseAsync(['node', 'docsnap', 'install-browsers']);

    expect(mockExecSync).toHaveBeenCalledWith('npx playwright-core install chromium', { stdio: 'inherit' });
    expect(logSpy).toHaveBeenCalledWith('✓ Chromium installed successfully');
    expect(process.exitCode).toBeUndefined();
  });

  it('sets exit code 1 when the install fails', async () => {
    mockExecSync.mockImplementation(() => {
      throw new Error('network unreachable');
    });

    await buildProgram().parseAsync(['node', 'docsnap', 'install-browsers']);

    expect(errorSpy).toHaveBeenCalledWith('✗ Failed to install Chromium');
    expect(process.exitCode).toBe(1);
  });

  it('runCli parses the given argv', async () => {
    const parseSpy = jest.spyOn(Command.prototype, 'parseAsync').mockResolvedValue(new Command());

    await runCli(['node', 'docsnap', '--help']);

    expect(parseSpy).toHaveBeenCalledWith(['node', 'docsnap', '--help']);
  });
});
