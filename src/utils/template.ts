import { ExpressionSyntaxError } from '../errors.js';
import type { Scope, Value } from '../types.js';
import { evalExpression } from './expression.js';
import { stringify, truthy } from './value.js';

export type TemplateSegment = { kind: 'text'; text: string } | { kind: 'expr'; source: string };

const OPEN = '${';

/**
 * Split a string into literal text and `${...}` placeholders. Braces inside
 * a placeholder nest (map literals) and quoted strings are skipped.
 */
export function parseTemplate(raw: string): TemplateSegment[] {
  const segments: TemplateSegment[] = [];
  let cursor = 0;
  for (;;) {
    const start = raw.indexOf(OPEN, cursor);
    if (start === -1) break;
    if (start > cursor) segments.push({ kind: 'text', text: raw.slice(cursor, start) });
    const end = findClose(raw, start + OPEN.length);
    if (end === -1) throw new ExpressionSyntaxError(`Unclosed template expression: ${raw}`);
    segments.push({ kind: 'expr', source: raw.slice(start + OPEN.length, end) });
    cursor = end + 1;
  }
  if (cursor < raw.length) segments.push({ kind: 'text', text: raw.slice(cursor) });
  return segments;
}

function findClose(raw: string, from: number): number {
  let depth = 0;
  let quote: string | null = null;
  for (let i = from; i < raw.length; i++) {
    const ch = raw[i];
    if (quote) {
      if (ch === '\\') i++;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      if (depth === 0) return i;
      depth--;
    }
  }
  return -1;
}

export function hasPlaceholder(raw: string): boolean {
  return raw.includes(OPEN);
}

/**
 * Render a value against a scope. Strings that are exactly one placeholder
 * yield the expression's native value; other strings are interpolated.
 */
export function renderTemplate(input: Value, scope: Scope): Value {
  if (typeof input !== 'string') return input;
  const segments = parseTemplate(input.trim());
  if (segments.length === 1 && segments[0].kind === 'expr') {
    return evalExpression(segments[0].source, scope);
  }
  return renderString(input, scope);
}

export function renderString(str: string, scope: Scope): string {
  return parseTemplate(str)
    .map(segment => (segment.kind === 'text' ? segment.text : stringify(evalExpression(segment.source, scope))))
    .join('');
}

/**
 * Resolve a guard or a source expression. Strings carrying placeholders are
 * rendered; bare strings are evaluated as expressions; other values pass.
 */
export function resolveExpression(input: Value, scope: Scope): Value {
  if (typeof input !== 'string') return input;
  if (hasPlaceholder(input)) return renderTemplate(input, scope);
  return evalExpression(input, scope);
}

export function evaluateCondition(input: Value, scope: Scope): boolean {
  return truthy(resolveExpression(input, scope));
}
