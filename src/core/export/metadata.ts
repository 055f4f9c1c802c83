// src/core/export/metadata.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { z } from 'zod';
import type { DocumentInfo, MetadataRecord } from '../types/index.js';
import { DOWNLOADER_VERSION, METADATA_FILENAME } from '../config/constants.js';

const metadataSchema = z.object({
  title: z.string(),
  doc_id: z.string().nullable(),
  url: z.string(),
  download_date: z.string(),
  downloader_version: z.string(),
});

export function metadataPath(outputDir: string): string {
  return path.join(outputDir, METADATA_FILENAME);
}

export function buildMetadata(info: DocumentInfo, now: Date = new Date()): MetadataRecord {
  return {
    title: info.title,
    doc_id: info.docId,
    url: info.sourceUrl,
    download_date: now.toISOString(),
    downloader_version: DOWNLOADER_VERSION,
  };
}

/**
 * Writes `<outputDir>/metadata.json`, replacing any previous record.
 * Returns the path written.
 */
export async function saveMetadata(
  info: DocumentInfo,
  outputDir: string,
  now: Date = new Date()
): Promise<string> {
  const filePath = metadataPath(outputDir);
  await fs.mkdir(outputDir, { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(buildMetadata(info, now), null, 2), 'utf-8');
  return filePath;
}

/**
 * Reads the record back. Missing, unparseable or malformed files all yield null.
 */
export async function loadMetadata(outputDir: string): Promise<MetadataRecord | null> {
  let content: string;
  try {
    content = await fs.readFile(metadataPath(outputDir), 'utf-8');
  } catch {
    return null;
  }

  try {
    const parsed = metadataSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
