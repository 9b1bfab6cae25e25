/**
 * File I/O
 *
 * Plain sequential load and save. Files are read and written as latin1 so
 * every byte survives the round trip. Saving truncates and rewrites in
 * place, so a crash mid-write can leave a truncated file.
 */

import * as fs from 'fs';
import { FileOpenError, errorMessage } from '../errors.ts';

const FILE_MODE = 0o644;

/**
 * Split file contents into rows, stripping trailing CR/LF from each line.
 * A final newline does not produce an extra empty row.
 */
export function splitLines(content: string): string[] {
  if (content.length === 0) return [];

  const lines = content.split('\n');
  if (content.endsWith('\n')) lines.pop();
  return lines.map((line) => line.replace(/[\r\n]+$/, ''));
}

/**
 * Read a file into rows. Failing to open it is fatal.
 */
export async function readDocumentFile(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(filePath, 'latin1');
  } catch (error) {
    throw new FileOpenError(filePath, errorMessage(error));
  }
  return splitLines(content);
}

/**
 * Overwrite a file with `content`, creating it when missing.
 * Returns the number of bytes written.
 */
export async function writeDocumentFile(filePath: string, content: string): Promise<number> {
  const data = Buffer.from(content, 'latin1');
  const handle = await fs.promises.open(filePath, fs.constants.O_RDWR | fs.constants.O_CREAT, FILE_MODE);
  try {
    await handle.truncate(data.length);
    const { bytesWritten } = await handle.write(data, 0, data.length, 0);
    return bytesWritten;
  } finally {
    await handle.close();
  }
}
