/**
 * Fatal error types
 *
 * Anything thrown with one of these classes ends the editor: the entry
 * point restores the terminal, prints the message and exits with code 1.
 */

export class TerminalError extends Error {
  constructor(
    readonly operation: string,
    message: string
  ) {
    super(`${operation}: ${message}`);
    this.name = 'TerminalError';
  }
}

export class FileOpenError extends Error {
  constructor(
    readonly filePath: string,
    message: string
  ) {
    super(`open ${filePath}: ${message}`);
    this.name = 'FileOpenError';
  }
}

/**
 * Message text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
