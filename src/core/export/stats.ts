// src/core/export/stats.ts
import * as path from 'path';
import * as fs from 'fs/promises';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB'];

export function formatFileSize(bytes: number): string {
  if (bytes <= 0) {
    return '0 B';
  }

  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(1)} ${SIZE_UNITS[unit]}`;
}

/**
 * Total size in bytes of a file, or of every file below a directory.
 */
export async function getPathSize(target: string): Promise<number> {
  const stat = await fs.stat(target);
  if (!stat.isDirectory()) {
    return stat.size;
  }

  let total = 0;
  const entries = await fs.readdir(target, { withFileTypes: true });
  for (const entry of entries) {
    total += await getPathSize(path.join(target, entry.name));
  }
  return total;
}
