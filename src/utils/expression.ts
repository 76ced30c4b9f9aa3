import fs from 'node:fs';
import { EvaluationError, ExpressionSyntaxError } from '../errors.js';
import type { Scope, Value, ValueMap } from '../types.js';
import { getAttribute, getIndex, isEmpty, length, stringify, truthy, typeName, valuesEqual } from './value.js';

// Expressions are a closed grammar: literals, names, attribute/index access,
// and/or/not, chained comparisons, list/map literals and three helper calls.
// Nothing else parses, so there is no escape hatch to whitelist against.

export type CompareOp = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type Helper = 'len' | 'empty' | 'exists';

export type ExpressionNode =
  | { kind: 'literal'; value: Value }
  | { kind: 'name'; name: string }
  | { kind: 'attr'; target: ExpressionNode; name: string }
  | { kind: 'index'; target: ExpressionNode; index: ExpressionNode }
  | { kind: 'bool'; op: 'and' | 'or'; operands: ExpressionNode[] }
  | { kind: 'not'; operand: ExpressionNode }
  | { kind: 'compare'; first: ExpressionNode; rest: Array<{ op: CompareOp; operand: ExpressionNode }> }
  | { kind: 'call'; helper: Helper; arg: ExpressionNode }
  | { kind: 'list'; items: ExpressionNode[] }
  | { kind: 'map'; entries: Array<{ key: ExpressionNode; value: ExpressionNode }> };

type Token =
  | { type: 'number'; value: number; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'name'; value: string; pos: number }
  | { type: 'op'; value: string; pos: number }
  | { type: 'eof'; pos: number };

const HELPERS: readonly Helper[] = ['len', 'empty', 'exists'];
const COMPARE_OPS: readonly string[] = ['==', '!=', '<', '<=', '>', '>='];
const TWO_CHAR_OPS = ['==', '!=', '<=', '>=', '**', '//'];
const SINGLE_CHAR_OPS = '<>()[]{},:.+-*/%=!|&^~?@';
const FORBIDDEN_OPS = new Set(['+', '-', '*', '/', '%', '**', '//', '=', '!', '|', '&', '^', '~', '?', '@']);
const FORBIDDEN_WORDS = new Set(['in', 'is', 'if', 'else', 'for', 'lambda', 'import']);
const CONSTANTS: Record<string, Value> = {
  true: true,
  false: false,
  null: null,
  True: true,
  False: false,
  None: null
};
const KEYWORDS = new Set(['and', 'or', 'not', ...Object.keys(CONSTANTS)]);

const NUMBER_RE = /\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const NAME_RE = /[A-Za-z_][A-Za-z0-9_]*/y;
const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '\\': '\\', "'": "'", '"': '"' };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    if (/\d/.test(ch)) {
      NUMBER_RE.lastIndex = i;
      const m = NUMBER_RE.exec(source);
      const text = m ? m[0] : ch;
      tokens.push({ type: 'number', value: Number(text), pos: i });
      i += text.length;
      continue;
    }
    if (ch === '"' || ch === "'") {
      const start = i;
      let out = '';
      i++;
      while (i < source.length && source[i] !== ch) {
        if (source[i] === '\\' && i + 1 < source.length) {
          const next = source[i + 1];
          out += ESCAPES[next] ?? next;
          i += 2;
        } else {
          out += source[i++];
        }
      }
      if (i >= source.length) throw new ExpressionSyntaxError(`Unterminated string literal in expression: ${source}`);
      i++;
      tokens.push({ type: 'string', value: out, pos: start });
      continue;
    }
    if (/[A-Za-z_]/.test(ch)) {
      NAME_RE.lastIndex = i;
      const m = NAME_RE.exec(source);
      const text = m ? m[0] : ch;
      tokens.push({ type: 'name', value: text, pos: i });
      i += text.length;
      continue;
    }
    const pair = source.slice(i, i + 2);
    if (TWO_CHAR_OPS.includes(pair)) {
      tokens.push({ type: 'op', value: pair, pos: i });
      i += 2;
      continue;
    }
    if (SINGLE_CHAR_OPS.includes(ch)) {
      tokens.push({ type: 'op', value: ch, pos: i });
      i++;
      continue;
    }
    throw new ExpressionSyntaxError(`Unexpected character '${ch}' at ${i} in expression: ${source}`);
  }
  tokens.push({ type: 'eof', pos: source.length });
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly source: string, private readonly tokens: Token[]) {}

  parse(): ExpressionNode {
    if (this.peek().type === 'eof') throw new ExpressionSyntaxError('Empty expression');
    const node = this.parseOr();
    if (this.peek().type !== 'eof') this.unexpected(this.peek());
    return node;
  }

  private peek(): Token {
    return this.tokens[this.pos];
  }

  private next(): Token {
    const token = this.tokens[this.pos];
    if (token.type !== 'eof') this.pos++;
    return token;
  }

  private isOp(value: string): boolean {
    const token = this.peek();
    return token.type === 'op' && token.value === value;
  }

  private isWord(value: string): boolean {
    const token = this.peek();
    return token.type === 'name' && token.value === value;
  }

  private expectOp(value: string): void {
    if (!this.isOp(value)) this.unexpected(this.peek());
    this.pos++;
  }

  private unexpected(token: Token): never {
    if ((token.type === 'op' && FORBIDDEN_OPS.has(token.value)) || (token.type === 'name' && FORBIDDEN_WORDS.has(token.value))) {
      throw new EvaluationError(`Forbidden expression construct '${token.value}' in: ${this.source}`);
    }
    const what = token.type === 'eof' ? 'end of expression' : `'${'value' in token ? String(token.value) : ''}'`;
    throw new ExpressionSyntaxError(`Invalid expression syntax: unexpected ${what} at ${token.pos} in: ${this.source}`);
  }

  private parseOr(): ExpressionNode {
    const operands = [this.parseAnd()];
    while (this.isWord('or')) {
      this.pos++;
      operands.push(this.parseAnd());
    }
    return operands.length === 1 ? operands[0] : { kind: 'bool', op: 'or', operands };
  }

  private parseAnd(): ExpressionNode {
    const operands = [this.parseNot()];
    while (this.isWord('and')) {
      this.pos++;
      operands.push(this.parseNot());
    }
    return operands.length === 1 ? operands[0] : { kind: 'bool', op: 'and', operands };
  }

  private parseNot(): ExpressionNode {
    if (this.isWord('not')) {
      this.pos++;
      return { kind: 'not', operand: this.parseNot() };
    }
    return this.parseComparison();
  }

  private parseComparison(): ExpressionNode {
    const first = this.parsePostfix();
    const rest: Array<{ op: CompareOp; operand: ExpressionNode }> = [];
    for (;;) {
      const token = this.peek();
      if (token.type !== 'op' || !isCompareOp(token.value)) break;
      this.pos++;
      rest.push({ op: token.value, operand: this.parsePostfix() });
    }
    return rest.length === 0 ? first : { kind: 'compare', first, rest };
  }

  private parsePostfix(): ExpressionNode {
    let node = this.parsePrimary();
    for (;;) {
      if (this.isOp('.')) {
        this.pos++;
        const name = this.next();
        if (name.type !== 'name') this.unexpected(name);
        node = { kind: 'attr', target: node, name: name.value };
      } else if (this.isOp('[')) {
        this.pos++;
        const index = this.parseOr();
        this.expectOp(']');
        node = { kind: 'index', target: node, index };
      } else if (this.isOp('(')) {
        node = this.parseCall(node);
      } else {
        return node;
      }
    }
  }

  private parseCall(callee: ExpressionNode): ExpressionNode {
    if (callee.kind !== 'name' || !isHelper(callee.name)) {
      throw new EvaluationError(`Only len, empty, exists calls are allowed in: ${this.source}`);
    }
    this.expectOp('(');
    const args = this.parseSequence(')');
    if (args.length !== 1) throw new EvaluationError(`${callee.name}() takes exactly one argument`);
    return { kind: 'call', helper: callee.name, arg: args[0] };
  }

  private parseSequence(close: string): ExpressionNode[] {
    const items: ExpressionNode[] = [];
    while (!this.isOp(close)) {
      items.push(this.parseOr());
      if (!this.isOp(',')) break;
      this.pos++;
    }
    this.expectOp(close);
    return items;
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();
    switch (token.type) {
      case 'number':
      case 'string':
        return { kind: 'literal', value: token.value };
      case 'name':
        if (Object.hasOwn(CONSTANTS, token.value)) return { kind: 'literal', value: CONSTANTS[token.value] };
        if (KEYWORDS.has(token.value) || FORBIDDEN_WORDS.has(token.value)) return this.unexpected(token);
        return { kind: 'name', name: token.value };
      case 'op':
        if (token.value === '(') {
          const inner = this.parseOr();
          this.expectOp(')');
          return inner;
        }
        if (token.value === '[') return { kind: 'list', items: this.parseSequence(']') };
        if (token.value === '{') return this.parseMap();
        if (token.value === '-' && this.peek().type === 'number') {
          const number = this.next();
          if (number.type === 'number') return { kind: 'literal', value: -number.value };
        }
        return this.unexpected(token);
      default:
        return this.unexpected(token);
    }
  }

  private parseMap(): ExpressionNode {
    const entries: Array<{ key: ExpressionNode; value: ExpressionNode }> = [];
    while (!this.isOp('}')) {
      const key = this.parseOr();
      this.expectOp(':');
      entries.push({ key, value: this.parseOr() });
      if (!this.isOp(',')) break;
      this.pos++;
    }
    this.expectOp('}');
    return { kind: 'map', entries };
  }
}

function isCompareOp(value: string): value is CompareOp {
  return COMPARE_OPS.includes(value);
}

function isHelper(name: string): name is Helper {
  return HELPERS.some(h => h === name);
}

export function parseExpression(source: string): ExpressionNode {
  return new Parser(source, tokenize(source)).parse();
}

function compare(op: CompareOp, left: Value, right: Value): boolean {
  if (op === '==') return valuesEqual(left, right);
  if (op === '!=') return !valuesEqual(left, right);
  let order: number;
  if (typeof left === 'number' && typeof right === 'number') {
    order = left - right;
  } else if (typeof left === 'string' && typeof right === 'string') {
    order = left < right ? -1 : left > right ? 1 : 0;
  } else {
    throw new EvaluationError(`Cannot compare ${typeName(left)} with ${typeName(right)} using '${op}'`);
  }
  switch (op) {
    case '<':
      return order < 0;
    case '<=':
      return order <= 0;
    case '>':
      return order > 0;
    case '>=':
      return order >= 0;
  }
}

function callHelper(helper: Helper, arg: Value): Value {
  switch (helper) {
    case 'len':
      return length(arg);
    case 'empty':
      return isEmpty(arg);
    case 'exists':
      return arg !== null && arg !== '' && fs.existsSync(stringify(arg));
  }
}

export function evaluateNode(node: ExpressionNode, scope: Scope): Value {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'name':
      if (!Object.hasOwn(scope, node.name)) throw new EvaluationError(`Unknown name in expression: ${node.name}`);
      return scope[node.name];
    case 'attr':
      return getAttribute(evaluateNode(node.target, scope), node.name);
    case 'index':
      return getIndex(evaluateNode(node.target, scope), evaluateNode(node.index, scope));
    case 'bool':
      if (node.op === 'and') return node.operands.every(operand => truthy(evaluateNode(operand, scope)));
      return node.operands.some(operand => truthy(evaluateNode(operand, scope)));
    case 'not':
      return !truthy(evaluateNode(node.operand, scope));
    case 'compare': {
      let left = evaluateNode(node.first, scope);
      for (const { op, operand } of node.rest) {
        const right = evaluateNode(operand, scope);
        if (!compare(op, left, right)) return false;
        left = right;
      }
      return true;
    }
    case 'call':
      return callHelper(node.helper, evaluateNode(node.arg, scope));
    case 'list':
      return node.items.map(item => evaluateNode(item, scope));
    case 'map': {
      const out: ValueMap = {};
      for (const entry of node.entries) {
        const key = evaluateNode(entry.key, scope);
        if (typeof key !== 'string' && typeof key !== 'number') {
          throw new EvaluationError(`Map literal keys must be strings or numbers, got ${typeName(key)}`);
        }
        out[String(key)] = evaluateNode(entry.value, scope);
      }
      return out;
    }
  }
}

export function evalExpression(expr: string, scope: Scope): Value {
  return evaluateNode(parseExpression(expr.trim()), scope);
}
