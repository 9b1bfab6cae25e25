/**
 * User Configuration
 *
 * Reads overrides from ~/.quill/settings.json (or $QUILL_CONFIG_DIR) once
 * at startup. A missing file is fine; an unreadable or invalid one leaves
 * the defaults in place and reports why.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { userSettingsSchema, type Settings } from './settings.ts';
import { debugLog } from '../debug.ts';
import { errorMessage } from '../errors.ts';

export type Environment = Record<string, string | undefined>;

/**
 * Directory holding the user's settings.json
 */
export function getConfigDir(env: Environment = process.env): string {
  if (env.QUILL_CONFIG_DIR) return env.QUILL_CONFIG_DIR;
  const home = env.HOME || env.USERPROFILE || '';
  return path.join(home, '.quill');
}

export class UserConfigManager {
  readonly settingsPath: string;

  constructor(configDir: string = getConfigDir()) {
    this.settingsPath = path.join(configDir, 'settings.json');
  }

  /**
   * Apply the user's settings file to `settings`.
   * Returns a message describing the problem when the file was rejected.
   */
  async load(settings: Settings): Promise<string | null> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.settingsPath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      return `Can't read ${this.settingsPath}: ${errorMessage(error)}`;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      return `Ignoring ${this.settingsPath}: ${errorMessage(error)}`;
    }

    const result = userSettingsSchema.safeParse(parsed);
    if (!result.success) {
      return `Ignoring ${this.settingsPath}: ${describeIssues(result.error)}`;
    }

    settings.update(result.data);
    debugLog(`[Config] loaded ${Object.keys(result.data).length} setting(s) from ${this.settingsPath}`);
    return null;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
