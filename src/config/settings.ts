/**
 * Settings Manager
 *
 * Typed editor configuration keyed by dotted names, with defaults.
 */

import { z } from 'zod';

export interface EditorSettings {
  'editor.tabSize': number;
  'editor.quitConfirmations': number;
  'editor.messageTimeout': number;
  'editor.escapeTimeout': number;
  'quill.debugLog': boolean;
}

export const defaultSettings: EditorSettings = {
  'editor.tabSize': 2,
  'editor.quitConfirmations': 3,
  'editor.messageTimeout': 5000,
  'editor.escapeTimeout': 100,
  'quill.debugLog': false,
};

const SETTING_KEYS: readonly (keyof EditorSettings)[] = [
  'editor.tabSize',
  'editor.quitConfirmations',
  'editor.messageTimeout',
  'editor.escapeTimeout',
  'quill.debugLog',
];

/**
 * Shape of a user settings file. Every key is optional; unknown keys are dropped.
 */
export const userSettingsSchema = z
  .object({
    'editor.tabSize': z.number().int().min(1).max(16),
    'editor.quitConfirmations': z.number().int().min(0).max(10),
    'editor.messageTimeout': z.number().int().min(0),
    'editor.escapeTimeout': z.number().int().min(0).max(2000),
    'quill.debugLog': z.boolean(),
  })
  .partial();

export class Settings {
  private settings: EditorSettings;

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings };
    this.update(initial);
  }

  /**
   * Get a setting value
   */
  get<K extends keyof EditorSettings>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends keyof EditorSettings>(key: K, value: EditorSettings[K]): void {
    this.settings[key] = value;
  }

  /**
   * Get all settings
   */
  getAll(): EditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings
   */
  update(partial: Partial<EditorSettings>): void {
    for (const key of SETTING_KEYS) {
      const value = partial[key];
      if (value !== undefined) {
        this.set(key, value);
      }
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    this.update(defaultSettings);
  }
}
