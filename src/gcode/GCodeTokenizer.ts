import { Diagnostic } from '../types';
import { ParsedLine, Token, TokenKind, TokenizeResult } from './types';

const LETTER_KINDS: { [letter: string]: TokenKind } = {
  G: 'command',
  M: 'command',
  X: 'axis',
  Y: 'axis',
  Z: 'axis',
  I: 'arc',
  J: 'arc',
  K: 'arc',
  R: 'arc',
  O: 'program',
  N: 'program',
  P: 'program',
  F: 'parameter',
  S: 'parameter',
  T: 'parameter',
  L: 'parameter' // repeat count of M98
};

// Letters that may stand alone without a number
const BARE_LETTERS = new Set(['O']);

const WORD = /([A-Z])([+-]?(?:\d+\.?\d*|\.\d+))?/y;

export function classifyLetter(letter: string): TokenKind {
  return LETTER_KINDS[letter] ?? 'unknown';
}

export class GCodeTokenizer {
  tokenize(text: string, lineNumber: number): TokenizeResult {
    const original = text.replace(/\r$/, '');
    const tokens: Token[] = [];
    const diagnostics: Diagnostic[] = [];

    const code = this.removeComments(original).toUpperCase();

    for (const chunk of code.split(/\s+/)) {
      if (!chunk || chunk === '%') continue;

      const malformed = this.scanChunk(chunk, tokens);
      if (malformed) {
        diagnostics.push({
          severity: 'error',
          message: `Malformed coordinate/command: "${malformed}"`,
          line: lineNumber,
          code: original.trim()
        });
      }
    }

    const line: ParsedLine = { lineNumber, original, tokens };
    return { line, diagnostics };
  }

  // Appends every word it can read; returns the unreadable remainder, if any
  private scanChunk(chunk: string, tokens: Token[]): string | undefined {
    let position = 0;

    while (position < chunk.length) {
      WORD.lastIndex = position;
      const match = WORD.exec(chunk);
      if (!match) {
        return chunk.substring(position);
      }

      const [raw, letter, digits] = match;
      if (digits === undefined && !BARE_LETTERS.has(letter)) {
        return chunk.substring(position);
      }

      tokens.push({
        letter,
        value: digits === undefined ? undefined : parseFloat(digits),
        raw,
        kind: classifyLetter(letter)
      });
      position += raw.length;
    }

    return undefined;
  }

  private removeComments(line: string): string {
    // Parenthesized comments, including one left open at the end of the line
    let result = line.replace(/\(.*?\)/g, ' ');
    const openParen = result.indexOf('(');
    if (openParen !== -1) {
      result = result.substring(0, openParen);
    }

    const semicolonIndex = result.indexOf(';');
    if (semicolonIndex !== -1) {
      result = result.substring(0, semicolonIndex);
    }

    // Block delete marker
    return result.trim().replace(/^\//, '');
  }
}
