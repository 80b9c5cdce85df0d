import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import path from 'path';
import { logger } from '../utils/logger';

let tempCounter = 0;

/**
 * Write `text` to a sibling temp file, then rename it over `target`, so a
 * crash mid-write leaves the previous file intact
 */
export async function writeFileAtomic(target: string, text: string): Promise<void> {
  await mkdir(path.dirname(target), { recursive: true });
  const temp = `${target}.${process.pid}.${++tempCounter}.tmp`;
  await writeFile(temp, text, 'utf-8');
  try {
    await rename(temp, target);
  } catch (error) {
    await unlink(temp).catch(cleanupError => {
      logger.warn(`Could not remove temp file ${temp}`, { error: String(cleanupError) });
    });
    throw error;
  }
}

/**
 * Compact JSON (no whitespace, non-ASCII kept as-is)
 */
export async function writeJsonFile(target: string, data: unknown): Promise<void> {
  await writeFileAtomic(target, JSON.stringify(data));
}
