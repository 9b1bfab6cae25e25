/**
 * Message Bar Component
 *
 * Bottom line of the screen. Shows the latest status message while it is
 * younger than the message timeout.
 */

import { SCREEN } from '../../terminal/ansi.ts';
import type { StatusMessage } from '../../state/index.ts';

export class MessageBar {
  constructor(
    private readonly timeout: number = 5000,
    private readonly now: () => number = Date.now
  ) {}

  isVisible(message: StatusMessage): boolean {
    return message.text.length > 0 && this.now() - message.time < this.timeout;
  }

  render(message: StatusMessage, width: number): string {
    const text = this.isVisible(message) ? message.text.slice(0, width) : '';
    return SCREEN.clearToEnd + text;
  }
}
