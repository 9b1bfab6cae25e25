/**
 * Syntax Registry
 *
 * The closed set of language descriptors the editor knows about, loaded
 * from languages.json next to this module. A filename selects the first
 * descriptor with a matching pattern.
 */

import * as fs from 'fs';
import { z } from 'zod';

export type KeywordKind = 'primary' | 'secondary';

export interface Keyword {
  text: string;
  kind: KeywordKind;
}

export interface SyntaxDescriptor {
  /** Filetype shown in the status bar */
  name: string;
  /** `.ext` patterns match the extension exactly, anything else is a substring match */
  filenamePatterns: string[];
  /** Primary keywords first, then secondary; matched in this order */
  keywords: Keyword[];
  lineCommentStart: string | null;
  blockCommentStart: string | null;
  blockCommentEnd: string | null;
  flags: {
    highlightNumbers: boolean;
    highlightStrings: boolean;
  };
}

const token = z.string().min(1);

const languageSchema = z.object({
  name: token,
  filenamePatterns: z.array(token).min(1),
  keywords: z
    .object({
      primary: z.array(token).default([]),
      secondary: z.array(token).default([]),
    })
    .default({}),
  lineCommentStart: token.nullable().default(null),
  blockCommentStart: token.nullable().default(null),
  blockCommentEnd: token.nullable().default(null),
  highlightNumbers: z.boolean().default(false),
  highlightStrings: z.boolean().default(false),
});

const registrySchema = z.array(languageSchema);

const LANGUAGES_FILE = new URL('./languages.json', import.meta.url);

/**
 * Parse and validate a registry from its JSON text
 */
export function parseSyntaxRegistry(json: string): SyntaxDescriptor[] {
  const languages = registrySchema.parse(JSON.parse(json));
  return languages.map((language) => ({
    name: language.name,
    filenamePatterns: language.filenamePatterns,
    keywords: [
      ...language.keywords.primary.map((text): Keyword => ({ text, kind: 'primary' })),
      ...language.keywords.secondary.map((text): Keyword => ({ text, kind: 'secondary' })),
    ],
    lineCommentStart: language.lineCommentStart,
    blockCommentStart: language.blockCommentStart,
    blockCommentEnd: language.blockCommentEnd,
    flags: {
      highlightNumbers: language.highlightNumbers,
      highlightStrings: language.highlightStrings,
    },
  }));
}

export const SYNTAX_REGISTRY: readonly SyntaxDescriptor[] = parseSyntaxRegistry(
  fs.readFileSync(LANGUAGES_FILE, 'utf8')
);

/**
 * Whether a single filename pattern matches
 */
export function matchesPattern(filename: string, pattern: string): boolean {
  if (pattern.startsWith('.')) {
    const dot = filename.lastIndexOf('.');
    return dot !== -1 && filename.slice(dot) === pattern;
  }
  return filename.includes(pattern);
}

/**
 * First descriptor whose patterns match the filename, in registration order
 */
export function findSyntax(
  filename: string | null,
  registry: readonly SyntaxDescriptor[] = SYNTAX_REGISTRY
): SyntaxDescriptor | null {
  if (!filename) return null;

  for (const syntax of registry) {
    if (syntax.filenamePatterns.some((pattern) => matchesPattern(filename, pattern))) {
      return syntax;
    }
  }
  return null;
}
