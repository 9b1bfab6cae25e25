/**
 * File I/O Unit Tests
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { readDocumentFile, splitLines, writeDocumentFile } from '../../../src/core/file-io.ts';
import { FileOpenError } from '../../../src/errors.ts';

describe('splitLines', () => {
  test('returns no rows for empty content', () => {
    expect(splitLines('')).toEqual([]);
  });

  test('does not add a row for the final newline', () => {
    expect(splitLines('a\nb\n')).toEqual(['a', 'b']);
  });

  test('keeps a last line without a newline', () => {
    expect(splitLines('a\nb')).toEqual(['a', 'b']);
  });

  test('strips carriage returns', () => {
    expect(splitLines('a\r\nb\r\n')).toEqual(['a', 'b']);
  });

  test('keeps blank lines', () => {
    expect(splitLines('a\n\n')).toEqual(['a', '']);
  });
});

describe('document files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quill-file-io-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('reads a file into rows', async () => {
    const file = path.join(dir, 'two.txt');
    fs.writeFileSync(file, 'one\r\ntwo\n');
    expect(await readDocumentFile(file)).toEqual(['one', 'two']);
  });

  test('reports a missing file as FileOpenError', async () => {
    await expect(readDocumentFile(path.join(dir, 'missing.txt'))).rejects.toBeInstanceOf(FileOpenError);
  });

  test('writes content and returns the byte count', async () => {
    const file = path.join(dir, 'out.txt');
    expect(await writeDocumentFile(file, 'hello\n')).toBe(6);
    expect(fs.readFileSync(file, 'utf8')).toBe('hello\n');
  });

  test('truncates a longer existing file', async () => {
    const file = path.join(dir, 'out.txt');
    fs.writeFileSync(file, 'a much longer original\n');
    await writeDocumentFile(file, 'x\n');
    expect(fs.readFileSync(file, 'utf8')).toBe('x\n');
  });

  test('round-trips bytes above 0x7f unchanged', async () => {
    const file = path.join(dir, 'bytes.bin');
    fs.writeFileSync(file, Buffer.from([0xc3, 0xa9, 0x0a]));

    const rows = await readDocumentFile(file);
    expect(rows).toEqual(['\xc3\xa9']);

    await writeDocumentFile(file, `${rows[0] ?? ''}\n`);
    expect([...fs.readFileSync(file)]).toEqual([0xc3, 0xa9, 0x0a]);
  });
});
