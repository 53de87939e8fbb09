import fs from 'fs/promises';
import path from 'path';
import { PersistenceFailedError } from '../errors.js';

/** `YYYYMMDD_HHMMSS` in UTC. */
export function timestampUTC(date: Date = new Date()): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}_${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function downloadName(entity: string, ext: string, date: Date = new Date()): string {
  return `${entity}_${timestampUTC(date)}.${ext}`;
}

export function serializeContent(content: unknown): string {
  return typeof content === 'string' ? content : JSON.stringify(content, null, 2);
}

/**
 * Writes `<dir>/<entity>_<timestamp>.<ext>`, creating `dir` when missing.
 * Not atomic: a crash mid-write can leave a partial file.
 */
export async function saveOutput(
  dir: string,
  entity: string,
  content: unknown,
  ext: string,
  date: Date = new Date(),
): Promise<string> {
  const filePath = path.join(dir, downloadName(entity, ext, date));
  try {
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, serializeContent(content), 'utf-8');
  } catch (err) {
    throw new PersistenceFailedError(filePath, err);
  }
  console.log(`[save] saved ${filePath}`);
  return filePath;
}
