/**
 * Syntax Registry Unit Tests
 */

import { describe, test, expect } from 'vitest';
import {
  findSyntax,
  matchesPattern,
  parseSyntaxRegistry,
  SYNTAX_REGISTRY,
} from '../../../../src/features/syntax/languages.ts';

describe('SYNTAX_REGISTRY', () => {
  test('loads the bundled languages in order', () => {
    expect(SYNTAX_REGISTRY.map((syntax) => syntax.name)).toEqual(['c', 'typescript', 'python']);
  });

  test('lists primary keywords before secondary ones', () => {
    const c = SYNTAX_REGISTRY[0];
    const kinds = c?.keywords.map((keyword) => keyword.kind) ?? [];
    expect(kinds.indexOf('secondary')).toBeGreaterThan(kinds.lastIndexOf('primary'));
    expect(c?.keywords.find((keyword) => keyword.text === 'int')?.kind).toBe('secondary');
    expect(c?.keywords.find((keyword) => keyword.text === 'while')?.kind).toBe('primary');
  });
});

describe('matchesPattern', () => {
  test('compares an extension pattern with the last extension only', () => {
    expect(matchesPattern('archive.tar.c', '.c')).toBe(true);
    expect(matchesPattern('file.cc', '.c')).toBe(false);
    expect(matchesPattern('Makefile', '.c')).toBe(false);
  });

  test('matches other patterns as substrings', () => {
    expect(matchesPattern('Makefile.local', 'Makefile')).toBe(true);
  });
});

describe('findSyntax', () => {
  test.each([
    ['main.c', 'c'],
    ['util.h', 'c'],
    ['app.ts', 'typescript'],
    ['index.mjs', 'typescript'],
    ['tool.py', 'python'],
  ])('%s is %s', (filename, name) => {
    expect(findSyntax(filename)?.name).toBe(name);
  });

  test('returns null for an unknown file', () => {
    expect(findSyntax('README')).toBeNull();
  });

  test('returns null without a filename', () => {
    expect(findSyntax(null)).toBeNull();
  });
});

describe('parseSyntaxRegistry', () => {
  test('fills defaults for omitted fields', () => {
    const [syntax] = parseSyntaxRegistry('[{ "name": "plain", "filenamePatterns": [".x"] }]');
    expect(syntax).toEqual({
      name: 'plain',
      filenamePatterns: ['.x'],
      keywords: [],
      lineCommentStart: null,
      blockCommentStart: null,
      blockCommentEnd: null,
      flags: { highlightNumbers: false, highlightStrings: false },
    });
  });

  test('rejects a language without filename patterns', () => {
    expect(() => parseSyntaxRegistry('[{ "name": "broken", "filenamePatterns": [] }]')).toThrow();
  });
});
