import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { buildMetadata, loadMetadata, metadataPath, saveMetadata } from '../metadata.js';
import type { DocumentInfo } from '../../types/index.js';

describe('metadata', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsnap-meta-'));
  });

  afterEach(async () => {
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  const info: DocumentInfo = { title: 'T', docId: '42', sourceUrl: 'u' };

  it('round-trips title, id and url', async () => {
    await saveMetadata(info, outputDir);
    const loaded = await loadMetadata(outputDir);

    expect(loaded?.title).toBe('T');
    expect(loaded?.doc_id).toBe('42');
    expect(loaded?.url).toBe('u');
  });

  it('writes the full record as indented JSON', async () => {
    const now = new Date('2026-03-01T12:00:00.000Z');
    const written = await saveMetadata(info, outputDir, now);

    expect(written).toBe(path.join(outputDir, 'metadata.json'));
    expect(await fs.readFile(written, 'utf-8')).toBe(
      JSON.stringify(
        {
          title: 'T',
          doc_id: '42',
          url: 'u',
          download_date: '2026-03-01T12:00:00.000Z',
          downloader_version: '1.0.0',
        },
        null,
        2
      )
    );
  });

  it('keeps a null document id', () => {
    expect(buildMetadata({ title: 'T', docId: null, sourceUrl: 'u' }).doc_id).toBeNull();
  });

  it('overwrites the previous record', async () => {
    await saveMetadata(info, outputDir);
    await saveMetadata({ title: 'Second', docId: null, sourceUrl: 'v' }, outputDir);

    const loaded = await loadMetadata(outputDir);
    expect(loaded?.title).toBe('Second');
    expect(loaded?.doc_id).toBeNull();
    expect(loaded?.url).toBe('v');
  });

  it('creates the output directory when missing', async () => {
    const nested = path.join(outputDir, 'a', 'b');
    await saveMetadata(info, nested);
    expect((await loadMetadata(nested))?.title).toBe('T');
  });

  it('returns null when there is no metadata file', async () => {
    expect(await loadMetadata(outputDir)).toBeNull();
  });

  it('returns null for unparseable JSON', async () => {
    await fs.writeFile(metadataPath(outputDir), '{ not json', 'utf-8');
    expect(await loadMetadata(outputDir)).toBeNull();
  });

  it('returns null when fields are missing or mistyped', async () => {
    await fs.writeFile(metadataPath(outputDir), JSON.stringify({ title: 3, url: 'u' }), 'utf-8');
    expect(await loadMetadata(outputDir)).toBeNull();
  });
});
