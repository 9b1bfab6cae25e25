/**
 * Terminal
 *
 * Owns raw-mode configuration of the controlling terminal, turns stdin
 * bytes into key events, and writes whole frames to stdout.
 */

import { CURSOR } from './ansi.ts';
import { KeyDecoder, type KeyEvent } from './input.ts';
import { TerminalError, errorMessage } from '../errors.ts';
import { debugLog } from '../debug.ts';

export type { KeyEvent } from './input.ts';

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

export type TerminalOutput = NodeJS.WritableStream & {
  columns?: number;
  rows?: number;
};

export interface WindowSize {
  rows: number;
  cols: number;
}

export interface TerminalOptions {
  escapeTimeout?: number;
  cursorReportTimeout?: number;
}

type ResizeCallback = (size: WindowSize) => void;

interface PendingRead {
  resolve: (event: KeyEvent) => void;
  reject: (error: Error) => void;
}

export class Terminal {
  private readonly decoder: KeyDecoder;
  private readonly cursorReportTimeout: number;
  private rawMode: boolean = false;
  private queue: KeyEvent[] = [];
  private pending: PendingRead[] = [];
  private failure: TerminalError | null = null;
  private resizeCallbacks: Set<ResizeCallback> = new Set();

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly output: TerminalOutput = process.stdout,
    options: TerminalOptions = {}
  ) {
    this.decoder = new KeyDecoder(options.escapeTimeout ?? 100);
    this.cursorReportTimeout = options.cursorReportTimeout ?? 1000;
    this.decoder.onKey((event) => this.enqueue(event));
  }

  get isRawMode(): boolean {
    return this.rawMode;
  }

  /**
   * Switch the terminal into raw mode and start reading keys
   */
  enableRawMode(): void {
    if (this.rawMode) return;

    if (!this.input.isTTY || !this.input.setRawMode) {
      throw new TerminalError('enableRawMode', 'standard input is not a terminal');
    }

    try {
      this.input.setRawMode(true);
    } catch (error) {
      throw new TerminalError('enableRawMode', errorMessage(error));
    }

    this.rawMode = true;
    this.input.on('data', this.handleData);
    this.input.on('error', this.handleError);
    this.output.on('resize', this.handleResize);
    this.input.resume();
    debugLog('[Terminal] raw mode enabled');
  }

  /**
   * Restore cooked mode. Safe to call on every exit path.
   */
  disableRawMode(): void {
    if (!this.rawMode) return;
    this.rawMode = false;

    this.input.removeListener('data', this.handleData);
    this.input.removeListener('error', this.handleError);
    this.output.removeListener('resize', this.handleResize);
    this.decoder.reset();
    this.input.pause();

    try {
      this.input.setRawMode?.(false);
    } catch (error) {
      debugLog(`[Terminal] failed to restore cooked mode: ${errorMessage(error)}`);
    }
    debugLog('[Terminal] raw mode disabled');
  }

  /**
   * Wait for the next decoded key
   */
  readKey(): Promise<KeyEvent> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.failure) return Promise.reject(this.failure);

    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  /**
   * Write a frame in one call. Text is latin1 so bytes pass through unchanged.
   */
  write(data: string): void {
    this.output.write(Buffer.from(data, 'latin1'));
  }

  /**
   * Terminal dimensions. Falls back to asking the terminal where the cursor
   * ends up after pushing it to the bottom-right corner.
   */
  async getWindowSize(): Promise<WindowSize> {
    const { columns, rows } = this.output;
    if (columns && rows) {
      return { rows, cols: columns };
    }
    debugLog('[Terminal] no size from the output stream, querying cursor position');
    return this.queryCursorPosition();
  }

  /**
   * Register resize callback
   */
  onResize(callback: ResizeCallback): () => void {
    this.resizeCallbacks.add(callback);
    return () => this.resizeCallbacks.delete(callback);
  }

  private queryCursorPosition(): Promise<WindowSize> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        unsubscribe();
        reject(new TerminalError('getWindowSize', 'terminal did not report the cursor position'));
      }, this.cursorReportTimeout);

      const unsubscribe = this.decoder.onCursorPosition((position) => {
        clearTimeout(timer);
        unsubscribe();
        if (position.rows > 0 && position.cols > 0) {
          resolve({ rows: position.rows, cols: position.cols });
        } else {
          reject(new TerminalError('getWindowSize', 'terminal reported an empty screen'));
        }
      });

      this.write(CURSOR.toBottomRight + CURSOR.requestPosition);
    });
  }

  private enqueue(event: KeyEvent): void {
    const reader = this.pending.shift();
    if (reader) {
      reader.resolve(event);
    } else {
      this.queue.push(event);
    }
  }

  private handleData = (data: Buffer | string): void => {
    this.decoder.feed(typeof data === 'string' ? data : data.toString('latin1'));
  };

  private handleError = (error: Error): void => {
    this.failure = new TerminalError('read', error.message);
    debugLog(`[Terminal] ${this.failure.message}`);
    for (const reader of this.pending.splice(0)) {
      reader.reject(this.failure);
    }
  };

  private handleResize = (): void => {
    const { columns, rows } = this.output;
    if (!columns || !rows) return;
    for (const callback of this.resizeCallbacks) {
      callback({ rows, cols: columns });
    }
  };
}
