/**
 * Reference extractor: finds `require` sites in Lua source text.
 *
 * Recognised forms:
 *   require "a.b"    require 'a.b'    require [[a.b]]    require("a.b")
 * Anything else passed to require (a variable, a concatenation, a table) is a
 * dynamic reference. A string argument that is not a module identifier is
 * malformed. Comments and string literals are skipped, so `require` inside
 * them is never reported.
 */

import { isLogicalIdentifier } from './module-name.js';
import type { ExtractedReference, ExtractionResult } from './types.js';

const REQUIRE = 'require';

interface StringLiteral {
  value: string;
  /** Index just past the closing delimiter */
  end: number;
  /** Contains escapes or is unterminated; never a usable identifier */
  irregular: boolean;
}

function isWordStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isWordChar(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function countNewlines(text: string, from: number, to: number): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (text[i] === '\n') count++;
  }
  return count;
}

/**
 * Level of a long bracket opening at `pos` (`[[` is 0, `[==[` is 2), or -1.
 */
function longBracketLevel(text: string, pos: number): number {
  if (text[pos] !== '[') return -1;
  let i = pos + 1;
  while (text[i] === '=') i++;
  return text[i] === '[' ? i - pos - 1 : -1;
}

function readLongString(text: string, pos: number, level: number): StringLiteral {
  const open = pos + level + 2;
  const close = ']' + '='.repeat(level) + ']';
  const closeAt = text.indexOf(close, open);
  if (closeAt < 0) {
    return { value: text.slice(open), end: text.length, irregular: true };
  }
  // A newline right after the opening bracket is not part of the string
  let value = text.slice(open, closeAt);
  if (value.startsWith('\r\n')) value = value.slice(2);
  else if (value.startsWith('\n')) value = value.slice(1);
  return { value, end: closeAt + close.length, irregular: false };
}

function readShortString(text: string, pos: number): StringLiteral {
  const quote = text[pos];
  let irregular = false;
  let i = pos + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      irregular = true;
      i += 2;
      continue;
    }
    if (ch === quote) {
      return { value: text.slice(pos + 1, i), end: i + 1, irregular };
    }
    if (ch === '\n') break;
    i++;
  }
  return { value: text.slice(pos + 1, i), end: i, irregular: true };
}

/**
 * Reads a string literal of either kind at `pos`, if one starts there.
 */
function readStringLiteral(text: string, pos: number): StringLiteral | undefined {
  const ch = text[pos];
  if (ch === '"' || ch === "'") return readShortString(text, pos);
  const level = longBracketLevel(text, pos);
  if (level >= 0) return readLongString(text, pos, level);
  return undefined;
}

/**
 * Index just past a comment starting at `pos` (which points at `--`).
 */
function skipComment(text: string, pos: number): number {
  const level = longBracketLevel(text, pos + 2);
  if (level >= 0) {
    return readLongString(text, pos + 2, level).end;
  }
  const newline = text.indexOf('\n', pos);
  return newline < 0 ? text.length : newline;
}

function skipWhitespace(text: string, pos: number): number {
  let i = pos;
  while (i < text.length && /\s/.test(text[i])) i++;
  return i;
}

/**
 * Index of the bracket closing the one at `pos`, skipping strings and
 * comments; -1 when unbalanced.
 */
function findClosing(text: string, pos: number, open: string, closeCh: string): number {
  let depth = 0;
  let i = pos;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '-' && text[i + 1] === '-') {
      i = skipComment(text, i);
      continue;
    }
    const literal = ch === '"' || ch === "'" || (ch === '[' && longBracketLevel(text, i) >= 0)
      ? readStringLiteral(text, i)
      : undefined;
    if (literal) {
      i = literal.end;
      continue;
    }
    if (ch === open) depth++;
    else if (ch === closeCh) {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return -1;
}

function fromLiteral(literal: StringLiteral, line: number): ExtractedReference {
  if (!literal.irregular && isLogicalIdentifier(literal.value)) {
    return { kind: 'identifier', identifier: literal.value, line };
  }
  return { kind: 'malformed', raw: literal.value, line };
}

/**
 * The character before a word, ignoring whitespace; used to reject
 * `obj.require` and `obj:require`.
 */
function precedingChar(text: string, wordStart: number): string {
  let i = wordStart - 1;
  while (i >= 0 && /[ \t]/.test(text[i])) i--;
  return i >= 0 ? text[i] : '';
}

interface CallParse {
  reference?: ExtractedReference;
  /** Where scanning resumes */
  resume: number;
}

/**
 * Parses what follows the word `require` at `pos`.
 */
function parseRequireCall(text: string, pos: number, line: number): CallParse {
  const argStart = skipWhitespace(text, pos);
  const ch = text[argStart];

  const literal = readStringLiteral(text, argStart);
  if (literal) {
    return { reference: fromLiteral(literal, line), resume: literal.end };
  }

  if (ch === '{') {
    const close = findClosing(text, argStart, '{', '}');
    const end = close < 0 ? text.length : close + 1;
    return {
      reference: { kind: 'dynamic', expression: text.slice(argStart, end).trim(), line },
      resume: argStart + 1
    };
  }

  if (ch === '(') {
    const close = findClosing(text, argStart, '(', ')');
    const inner = text.slice(argStart + 1, close < 0 ? text.length : close);
    const innerStart = skipWhitespace(inner, 0);
    const innerLiteral = readStringLiteral(inner, innerStart);

    let reference: ExtractedReference;
    if (close < 0 || inner.trim() === '') {
      reference = { kind: 'malformed', raw: inner.trim(), line };
    } else if (innerLiteral && inner.slice(innerLiteral.end).trim() === '') {
      reference = fromLiteral(innerLiteral, line);
    } else {
      reference = { kind: 'dynamic', expression: inner.trim(), line };
    }
    // Resume inside the parentheses so nested require calls are still seen
    return { reference, resume: argStart + 1 };
  }

  // `require` used as a value (local r = require), not a call
  return { resume: pos };
}

/**
 * Extract every `require` reference from Lua source text, in source order.
 */
export function extractReferences(text: string): ExtractionResult {
  const references: ExtractedReference[] = [];
  let line = 1;
  let i = 0;

  const advanceTo = (target: number): void => {
    line += countNewlines(text, i, target);
    i = target;
  };

  while (i < text.length) {
    const ch = text[i];

    if (ch === '-' && text[i + 1] === '-') {
      advanceTo(skipComment(text, i));
      continue;
    }

    const literal = ch === '"' || ch === "'" || ch === '['
      ? readStringLiteral(text, i)
      : undefined;
    if (literal) {
      advanceTo(literal.end);
      continue;
    }

    if (isWordStart(ch)) {
      let end = i + 1;
      while (end < text.length && isWordChar(text[end])) end++;
      const word = text.slice(i, end);
      const before = precedingChar(text, i);

      if (word === REQUIRE && before !== '.' && before !== ':') {
        const parsed = parseRequireCall(text, end, line);
        if (parsed.reference) references.push(parsed.reference);
        advanceTo(Math.max(parsed.resume, end));
      } else {
        advanceTo(end);
      }
      continue;
    }

    advanceTo(i + 1);
  }

  return { references };
}

/**
 * Identifiers of a result, in order, duplicates preserved.
 */
export function listIdentifiers(result: ExtractionResult): string[] {
  const identifiers: string[] = [];
  for (const ref of result.references) {
    if (ref.kind === 'identifier') identifiers.push(ref.identifier);
  }
  return identifiers;
}

export function countReferences(result: ExtractionResult): { identifiers: number; dynamic: number; malformed: number } {
  let identifiers = 0;
  let dynamic = 0;
  let malformed = 0;
  for (const ref of result.references) {
    if (ref.kind === 'identifier') identifiers++;
    else if (ref.kind === 'dynamic') dynamic++;
    else malformed++;
  }
  return { identifiers, dynamic, malformed };
}
