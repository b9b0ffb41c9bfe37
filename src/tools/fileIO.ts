/**
 * File access for the tool operations.
 *
 * Reads are whole-file; writes go to a temp file beside the target and are
 * renamed into place, so a failed run never leaves a partial output file.
 */

import fs from 'node:fs';
import path from 'node:path';
import { IOFailure } from '../errors.js';

export async function readInput(filePath: string): Promise<Buffer> {
  try {
    return await fs.promises.readFile(filePath);
  } catch (err) {
    throw new IOFailure(filePath, 'read', err);
  }
}

export async function writeOutputAtomic(filePath: string, data: Buffer | string): Promise<void> {
  const target = path.resolve(filePath);
  const dir = path.dirname(target);
  const tempPath = path.join(dir, `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);

  let dirReady = false;
  try {
    await fs.promises.mkdir(dir, { recursive: true });
    dirReady = true;
    await fs.promises.writeFile(tempPath, data);
    await fs.promises.rename(tempPath, target);
  } catch (err) {
    if (dirReady) await fs.promises.rm(tempPath, { force: true });
    throw new IOFailure(filePath, 'write', err);
  }
}

export function hasExtension(filePath: string, extension: string): boolean {
  return path.extname(filePath).toLowerCase() === extension;
}

/**
 * `<dir>/<name>_remapped_<YYYYMMDD_HHMMSS>.twb` next to the input workbook
 */
export function defaultRemapOutputPath(workbookPath: string, now: Date = new Date()): string {
  const dir = path.dirname(workbookPath);
  const base = path.basename(workbookPath, path.extname(workbookPath));
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return path.join(dir, `${base}_remapped_${stamp}.twb`);
}
