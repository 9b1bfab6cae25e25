/**
 * Terminal Unit Tests
 *
 * Runs against in-process stand-ins for stdin and stdout.
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { PassThrough, Writable } from 'stream';
import { Terminal } from '../../../src/terminal/index.ts';
import { TerminalError } from '../../../src/errors.ts';

class FakeInput extends PassThrough {
  isTTY: boolean = true;
  rawModes: boolean[] = [];

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }
}

class FakeOutput extends Writable {
  columns?: number;
  rows?: number;
  chunks: Buffer[] = [];

  constructor(size?: { rows: number; cols: number }) {
    super();
    this.rows = size?.rows;
    this.columns = size?.cols;
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  get written(): string {
    return Buffer.concat(this.chunks).toString('latin1');
  }
}

describe('Terminal', () => {
  let input: FakeInput;
  let output: FakeOutput;
  let terminal: Terminal;

  beforeEach(() => {
    input = new FakeInput();
    output = new FakeOutput({ rows: 24, cols: 80 });
    terminal = new Terminal(input, output, { escapeTimeout: 10, cursorReportTimeout: 50 });
  });

  afterEach(() => {
    terminal.disableRawMode();
    vi.useRealTimers();
  });

  // ──────────────────────────────────────────────────────────────────
  // Raw mode
  // ──────────────────────────────────────────────────────────────────

  describe('raw mode', () => {
    test('refuses input that is not a terminal', () => {
      input.isTTY = false;
      expect(() => terminal.enableRawMode()).toThrow(TerminalError);
      expect(terminal.isRawMode).toBe(false);
    });

    test('enables and restores exactly once', () => {
      terminal.enableRawMode();
      terminal.enableRawMode();
      expect(terminal.isRawMode).toBe(true);

      terminal.disableRawMode();
      terminal.disableRawMode();
      expect(input.rawModes).toEqual([true, false]);
    });
  });

  // ──────────────────────────────────────────────────────────────────
  // Keys
  // ──────────────────────────────────────────────────────────────────

  describe('readKey', () => {
    test('resolves with the next key typed', async () => {
      terminal.enableRawMode();
      const next = terminal.readKey();
      input.write('\x1b[A');
      expect(await next).toEqual({ key: 'UP', ctrl: false });
    });

    test('queues keys that arrive before they are read', async () => {
      terminal.enableRawMode();
      input.write('ab');
      expect((await terminal.readKey()).char).toBe('a');
      expect((await terminal.readKey()).char).toBe('b');
    });

    test('decodes input bytes one char per byte', async () => {
      terminal.enableRawMode();
      input.write(Buffer.from([0xc3]));
      expect((await terminal.readKey()).char).toBe('\xc3');
    });

    test('rejects pending reads when stdin fails', async () => {
      terminal.enableRawMode();
      const next = terminal.readKey();
      input.emit('error', new Error('boom'));
      await expect(next).rejects.toThrow('read: boom');
    });
  });

  describe('write', () => {
    test('sends each char as one byte', () => {
      terminal.write('a\xe9');
      expect(Buffer.concat(output.chunks)).toEqual(Buffer.from([0x61, 0xe9]));
    });
  });

  // ──────────────────────────────────────────────────────────────────
  // Window size
  // ──────────────────────────────────────────────────────────────────

  describe('getWindowSize', () => {
    test('uses the size of the output stream', async () => {
      expect(await terminal.getWindowSize()).toEqual({ rows: 24, cols: 80 });
      expect(output.written).toBe('');
    });

    test('falls back to a cursor position report', async () => {
      output = new FakeOutput();
      terminal = new Terminal(input, output, { cursorReportTimeout: 50 });
      terminal.enableRawMode();

      const size = terminal.getWindowSize();
      expect(output.written).toBe('\x1b[999C\x1b[999B\x1b[6n');

      input.write('\x1b[40;120R');
      expect(await size).toEqual({ rows: 40, cols: 120 });
    });

    test('fails when the terminal never reports', async () => {
      vi.useFakeTimers();
      output = new FakeOutput();
      terminal = new Terminal(input, output, { cursorReportTimeout: 50 });
      terminal.enableRawMode();

      const assertion = expect(terminal.getWindowSize()).rejects.toBeInstanceOf(TerminalError);
      vi.advanceTimersByTime(50);
      await assertion;
    });
  });

  describe('onResize', () => {
    test('reports the new size of the output stream', () => {
      const sizes: { rows: number; cols: number }[] = [];
      terminal.enableRawMode();
      terminal.onResize((size) => sizes.push(size));

      output.rows = 30;
      output.columns = 100;
      output.emit('resize');

      expect(sizes).toEqual([{ rows: 30, cols: 100 }]);
    });
  });
});
