/**
 * blockquery — Block query tokenizer
 *
 * Splits a query string into comma-delimited segments and scans
 * each segment into sigil-classified tokens. Whitespace between
 * tokens is ignored.
 */

import { QuerySyntaxError } from './types.js';
import type { Token, TokenKind } from './types.js';

/** Sigils that introduce a named token, mapped to their token kind. */
const SIGIL_KINDS: Readonly<Record<string, TokenKind>> = {
  '%': 'TYPE_TAG',
  $: 'STRICT_TYPE_TAG',
  '~': 'MATERIAL',
  '@': 'REFERENCE',
};

/**
 * Split a query string on commas that are not inside a `[...]` group.
 * Each segment is trimmed. Trailing empty segments are dropped, but the
 * first segment is always kept, so `""` yields `[""]`.
 */
export function splitSegments(spec: string): string[] {
  const segments: string[] = [];
  let depth = 0;
  let start = 0;

  for (let pos = 0; pos < spec.length; pos++) {
    const ch = spec[pos];
    if (ch === '[') {
      depth++;
    } else if (ch === ']') {
      if (depth > 0) depth--;
    } else if (ch === ',' && depth === 0) {
      segments.push(spec.slice(start, pos).trim());
      start = pos + 1;
    }
  }
  segments.push(spec.slice(start).trim());

  while (segments.length > 1 && segments[segments.length - 1] === '') {
    segments.pop();
  }
  return segments;
}

/**
 * Scan the next token of `fragment` starting at `offset`.
 * Returns null when only whitespace remains.
 *
 * @throws QuerySyntaxError when the remaining text matches no token form
 */
export function nextToken(fragment: string, offset: number): Token | null {
  let pos = offset;
  while (pos < fragment.length && isWhitespace(fragment[pos])) {
    pos++;
  }
  if (pos >= fragment.length) {
    return null;
  }

  const ch = fragment[pos];

  if (ch === '!') {
    return { kind: 'NOT', text: '!', value: '', offset: pos };
  }

  // Bare identifier, optionally namespaced (namespace:name)
  if (isIdentPart(ch) || ch === ':') {
    let end = pos;
    while (end < fragment.length && (isIdentPart(fragment[end]) || fragment[end] === ':')) {
      end++;
    }
    const text = fragment.slice(pos, end);
    return { kind: 'IDENT', text, value: text, offset: pos };
  }

  const sigilKind = SIGIL_KINDS[ch];
  if (sigilKind !== undefined) {
    let end = pos + 1;
    while (end < fragment.length && isIdentPart(fragment[end])) {
      end++;
    }
    if (end === pos + 1) {
      throw new QuerySyntaxError(fragment, fragment.slice(pos), `expected a name after '${ch}'`);
    }
    const text = fragment.slice(pos, end);
    return { kind: sigilKind, text, value: text.slice(1), offset: pos };
  }

  if (ch === '[') {
    const close = fragment.indexOf(']', pos + 1);
    if (close === -1) {
      throw new QuerySyntaxError(fragment, fragment.slice(pos), "unterminated '['");
    }
    const text = fragment.slice(pos, close + 1);
    return { kind: 'PROPERTY_GROUP', text, value: text.slice(1, -1), offset: pos };
  }

  throw new QuerySyntaxError(fragment, fragment.slice(pos));
}

/** Scan every token of a single segment. */
export function tokenizeSegment(fragment: string): Token[] {
  const tokens: Token[] = [];
  let offset = 0;
  for (;;) {
    const token = nextToken(fragment, offset);
    if (token === null) {
      return tokens;
    }
    tokens.push(token);
    offset = token.offset + token.text.length;
  }
}

/** Split the interior of a `[...]` group into its comma-delimited items. */
export function splitPropertyGroup(interior: string): string[] {
  return interior.split(',').map((item) => item.trim());
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

function isIdentPart(ch: string): boolean {
  return (
    (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || (ch >= '0' && ch <= '9') || ch === '_'
  );
}
