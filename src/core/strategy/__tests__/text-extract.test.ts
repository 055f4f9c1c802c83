import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { TextExtractStrategy } from '../text-extract.js';
import { createDocumentInfo } from '../../info/extractor.js';
import { silentLogger } from '../../logger.js';
import { FakeElement, FakeSession } from '../../__tests__/fakes/session.js';

describe('TextExtractStrategy', () => {
  const document = createDocumentInfo('Lecture 3', 'https://www.scribd.com/document/3/lecture-3');
  let outputDir: string;

  const context = (session: FakeSession) => ({
    session,
    document,
    outputDir,
    logger: silentLogger(),
  });

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsnap-text-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  it('joins trimmed text from every locator in order with blank lines', async () => {
    const session = new FakeSession({
      '.text_layer': [new FakeElement({ text: '  first  ' }), new FakeElement({ text: '   ' })],
      p: [new FakeElement({ text: 'second' }), new FakeElement({ text: null })],
      '.text': [new FakeElement({ text: 'third\n' })],
    });

    const outcome = await new TextExtractStrategy().attempt(context(session));

    const textFile = path.join(outputDir, 'Lecture 3.txt');
    expect(outcome).toEqual({ kind: 'success', outputPath: textFile });
    expect(await fs.readFile(textFile, 'utf-8')).toBe('first\n\nsecond\n\nthird');
  });

  it('keeps element order within a locator', async () => {
    const session = new FakeSession({
      p: [new FakeElement({ text: 'b' }), new FakeElement({ text: 'a' })],
    });

    const texts = await new TextExtractStrategy().collect(context(session));

    expect(texts).toEqual(['b', 'a']);
  });

  it('continues past a locator whose query throws', async () => {
    const session = new FakeSession(
      {
        '.text_layer': [new FakeElement({ text: 'kept' })],
        '.document-text': [new FakeElement({ text: 'also kept' })],
      },
      { brokenSelectors: ['p'] }
    );

    const texts = await new TextExtractStrategy().collect(context(session));

    expect(texts).toEqual(['kept', 'also kept']);
  });

  it('defers and writes nothing when the page has no text', async () => {
    const session = new FakeSession();

    const outcome = await new TextExtractStrategy().attempt(context(session));

    expect(outcome).toEqual({ kind: 'deferred', reason: 'no_content' });
    expect(await fs.readdir(outputDir)).toEqual([]);
  });
});
