#!/usr/bin/env tsx
/**
 * Quill - Terminal Text Editor
 *
 * Entry point for the application.
 *
 * Usage: quill [file]
 */

import { Editor, HELP_MESSAGE } from './app.ts';
import { Settings } from './config/settings.ts';
import { UserConfigManager } from './config/user-config.ts';
import { Terminal } from './terminal/index.ts';
import { CURSOR, SCREEN } from './terminal/ansi.ts';
import { debugLog, setDebugEnabled } from './debug.ts';
import { errorMessage } from './errors.ts';

async function main(args: string[]): Promise<number> {
  const settings = new Settings();
  const configProblem = await new UserConfigManager().load(settings);
  setDebugEnabled(settings.get('quill.debugLog') || process.env.QUILL_DEBUG === '1');
  debugLog(`[Main] starting with args: ${JSON.stringify(args)}`);

  const terminal = new Terminal(process.stdin, process.stdout, {
    escapeTimeout: settings.get('editor.escapeTimeout'),
  });

  // Raw mode must never outlive the process
  process.on('exit', () => terminal.disableRawMode());

  try {
    terminal.enableRawMode();
    const size = await terminal.getWindowSize();
    const editor = new Editor(terminal, size, { settings });

    const filePath = args[0];
    if (filePath !== undefined) {
      await editor.open(filePath);
    }

    terminal.onResize((newSize) => {
      editor.resize(newSize);
      editor.refreshScreen();
    });

    editor.setStatusMessage(configProblem ?? HELP_MESSAGE);
    await editor.run();

    terminal.disableRawMode();
    return 0;
  } catch (error) {
    terminal.write(SCREEN.clear + CURSOR.home);
    terminal.disableRawMode();
    debugLog(`[Main] fatal: ${errorMessage(error)}`);
    process.stderr.write(`quill: ${errorMessage(error)}\n`);
    return 1;
  }
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`quill: ${errorMessage(error)}\n`);
    process.exit(1);
  }
);
