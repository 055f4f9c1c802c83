import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from '../logger.js';

function captureStream() {
  const lines: Record<string, unknown>[] = [];
  return {
    lines,
    stream: {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  };
}

describe('RunLogger', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsnap-log-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes structured lines with component bindings', () => {
    const capture = captureStream();
    const logger = createLogger({ level: 'info', destination: capture.stream });

    logger.child('downloader', { url: 'https://example.com' }).info('Loading page', { attempt: 1 });

    expect(capture.lines).toHaveLength(1);
    expect(capture.lines[0]).toMatchObject({
      level: 'info',
      msg: 'Loading page',
      service: 'docsnap',
      component: 'downloader',
      url: 'https://example.com',
      attempt: 1,
    });
  });

  it('drops messages below the configured level', () => {
    const capture = captureStream();
    const logger = createLogger({ level: 'warn', destination: capture.stream });

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('shown');

    expect(capture.lines.map(l => l.msg)).toEqual(['shown']);
  });

  it('serializes errors passed in context', () => {
    const capture = captureStream();
    const logger = createLogger({ level: 'info', destination: capture.stream });

    logger.error('Download aborted', { code: 'x', error: new Error('boom') });

    expect(capture.lines[0]).toMatchObject({
      level: 'error',
      msg: 'Download aborted',
      code: 'x',
      err: { name: 'Error', message: 'boom' },
    });
  });

  it('also writes to a log file and flushes it on close', async () => {
    const capture = captureStream();
    const file = path.join(dir, 'logs', 'run.log');
    const logger = createLogger({ level: 'info', destination: capture.stream, file });

    logger.info('to file');
    logger.close();

    const content = await fs.readFile(file, 'utf-8');
    expect(JSON.parse(content.trim())).toMatchObject({ msg: 'to file', level: 'info' });
  });
});
