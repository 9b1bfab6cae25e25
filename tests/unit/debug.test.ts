/**
 * Debug Logging Unit Tests
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { debugLog, isDebugEnabled, setDebugEnabled, setDebugLogPath } from '../../src/debug.ts';

describe('debugLog', () => {
  let dir: string;
  let logFile: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'quill-debug-'));
    logFile = path.join(dir, 'debug.log');
    setDebugLogPath(logFile);
  });

  afterEach(() => {
    setDebugEnabled(false);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('writes nothing while disabled', () => {
    debugLog('[Test] hidden');
    expect(fs.existsSync(logFile)).toBe(false);
  });

  test('appends timestamped lines when enabled', () => {
    setDebugEnabled(true);
    debugLog('[Test] first');
    debugLog('[Test] second');

    const lines = fs.readFileSync(logFile, 'utf8').trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[Test\] first$/);
    expect(lines[1]?.endsWith('] [Test] second')).toBe(true);
  });

  test('switches itself off when the log cannot be written', () => {
    setDebugEnabled(true);
    setDebugLogPath(path.join(dir, 'missing', 'debug.log'));
    debugLog('[Test] lost');
    expect(isDebugEnabled()).toBe(false);
  });
});
