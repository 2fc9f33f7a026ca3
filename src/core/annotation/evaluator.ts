/**
 * Evaluates directive argument text into a ParameterList.
 *
 * The argument text is a small literal-list language:
 *
 *   GET, '/users/:id', name: 'users.show', methods: (GET, POST)
 *
 * It is wrapped in an implicit outer group, quoted literals are masked out,
 * whitespace around punctuation is collapsed, and the token stream is reduced
 * by a recursive-descent interpreter over lists, key/value pairs, strings,
 * booleans and numbers. Nothing is ever handed to a host evaluator.
 */
import { ParseError } from '../../utils/errors.js';
import type { ParameterList, ParameterValue } from './types.js';

type Scalar = string | number | boolean;

type Token =
  | { type: 'open' }
  | { type: 'close' }
  | { type: 'comma' }
  | { type: 'colon' }
  | { type: 'literal'; value: Scalar };

interface Entry {
  key?: Scalar;
  value: ParameterValue;
}

// Groups may nest one level below the implicit outer list.
const MAX_NESTING = 1;

const PLACEHOLDER = '\u0000';
const PLACEHOLDER_PATTERN = /^\u0000(\d+)\u0000$/;
const SEPARATOR_WHITESPACE = /\s*([(),:])\s*/g;
const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;
const BOOLEAN_PATTERN = /^(?:true|false)$/i;
const BARE_KEY_PATTERN = /^[A-Za-z_][\w.-]*$/;
const BAREWORD_UNSAFE = /[(),:'"\u0000]/;

/**
 * Evaluate directive argument text.
 * @throws ParseError when the text does not reduce to a literal list
 */
export function evaluateParameters(argumentText: string): ParameterList {
  const wrapped = `(${argumentText})`;
  const { text, literals } = maskQuotedLiterals(wrapped);
  const normalized = text.replace(SEPARATOR_WHITESPACE, '$1');
  const tokens = tokenize(normalized, literals);
  const entries = new EntryReader(tokens).readDocument();

  const positional: ParameterValue[] = [];
  const keyed = new Map<string, ParameterValue>();
  for (const entry of entries) {
    const key = entry.key === undefined ? '' : String(entry.key).toLowerCase();
    if (key !== '') {
      keyed.set(key, entry.value);
    } else {
      positional.push(entry.value);
    }
  }
  // fromEntries defines own properties, so a "__proto__" key stays a plain key.
  return { positional, keyed: Object.fromEntries(keyed) };
}

/**
 * Replace quoted literals with numbered placeholders so later
 * normalization cannot touch their content.
 */
function maskQuotedLiterals(source: string): { text: string; literals: string[] } {
  const literals: string[] = [];
  let text = '';
  let i = 0;

  while (i < source.length) {
    const ch = source[i];
    if (ch === PLACEHOLDER) {
      throw new ParseError('Unexpected NUL character outside a string literal', { argumentText: source.slice(1, -1) });
    }
    if (ch !== "'" && ch !== '"') {
      text += ch;
      i++;
      continue;
    }

    // A quote preceded by a backslash does not close the literal.
    let close = i + 1;
    while (close < source.length && !(source[close] === ch && source[close - 1] !== '\\')) {
      close++;
    }
    if (close >= source.length) {
      throw new ParseError(`Unterminated string literal starting at ${source.slice(i, i + 20)}`, {
        argumentText: source.slice(1, -1),
      });
    }

    const raw = source.slice(i + 1, close);
    literals.push(raw.split(`\\${ch}`).join(ch));
    text += `${PLACEHOLDER}${literals.length - 1}${PLACEHOLDER}`;
    i = close + 1;
  }

  return { text, literals };
}

function tokenize(text: string, literals: string[]): Token[] {
  const tokens: Token[] = [];
  let segment = '';

  const flush = (): void => {
    if (segment === '') return;
    tokens.push(toLiteral(segment, literals));
    segment = '';
  };

  for (const ch of text) {
    switch (ch) {
      case '(':
        flush();
        tokens.push({ type: 'open' });
        break;
      case ')':
        flush();
        tokens.push({ type: 'close' });
        break;
      case ',':
        flush();
        tokens.push({ type: 'comma' });
        break;
      case ':':
        flush();
        tokens.push({ type: 'colon' });
        break;
      default:
        segment += ch;
    }
  }
  flush();

  return tokens;
}

/**
 * Turn a segment between separators into a literal token.
 * Barewords are implicit literals: booleans, numbers, or strings.
 */
function toLiteral(segment: string, literals: string[]): Token {
  const placeholder = PLACEHOLDER_PATTERN.exec(segment);
  if (placeholder) {
    return { type: 'literal', value: literals[Number(placeholder[1])] };
  }

  if (segment.includes(PLACEHOLDER)) {
    const restored = segment.replace(/\u0000(\d+)\u0000/g, (_m, index: string) => `'${literals[Number(index)]}'`);
    throw new ParseError(`Unexpected string literal in "${restored}"`, { segment: restored });
  }

  const word = segment.trim();
  if (BOOLEAN_PATTERN.test(word)) {
    return { type: 'literal', value: word.toLowerCase() === 'true' };
  }
  if (NUMBER_PATTERN.test(word) && isExactNumber(word)) {
    return { type: 'literal', value: Number(word) };
  }
  return { type: 'literal', value: word };
}

/**
 * Numeric barewords that a double cannot hold exactly stay strings:
 * overflow to Infinity, integers past 2^53, and negative zero.
 */
function isExactNumber(word: string): boolean {
  const value = Number(word);
  if (!Number.isFinite(value) || Object.is(value, -0)) return false;
  return !INTEGER_PATTERN.test(word) || Number.isSafeInteger(value);
}

function describeToken(token: Token | undefined): string {
  if (!token) return 'end of input';
  switch (token.type) {
    case 'open':
      return '"("';
    case 'close':
      return '")"';
    case 'comma':
      return '","';
    case 'colon':
      return '":"';
    case 'literal':
      return `"${String(token.value)}"`;
  }
}

/**
 * Recursive-descent reader over the closed grammar:
 *
 *   document := list EOF
 *   list     := '(' [ entry { ',' entry } [ ',' ] ] ')'
 *   entry    := value [ ':' value ]
 *   value    := literal | list
 */
class EntryReader {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  readDocument(): Entry[] {
    this.expect('open');
    const entries = this.readList(0);
    if (this.pos < this.tokens.length) {
      throw new ParseError(`Unexpected ${describeToken(this.peek())} after the parameter list`);
    }
    return entries;
  }

  /** Reads entries up to and including the closing ')'. */
  private readList(depth: number): Entry[] {
    const entries: Entry[] = [];

    if (this.peek()?.type === 'close') {
      this.pos++;
      return entries;
    }

    for (;;) {
      entries.push(this.readEntry(depth));

      const next = this.next();
      if (next?.type === 'close') return entries;
      if (next?.type !== 'comma') {
        throw new ParseError(`Expected "," or ")" but found ${describeToken(next)}`);
      }
      // Trailing comma
      if (this.peek()?.type === 'close') {
        this.pos++;
        return entries;
      }
    }
  }

  private readEntry(depth: number): Entry {
    const value = this.readValue(depth);
    if (this.peek()?.type !== 'colon') {
      return { value };
    }
    this.pos++;

    if (depth > 0) {
      throw new ParseError('Key/value pairs are only allowed at the top level');
    }
    if (Array.isArray(value)) {
      throw new ParseError('A parameter key must be a single value, not a list');
    }

    const associated = this.readValue(depth);
    if (this.peek()?.type === 'colon') {
      throw new ParseError(`Unexpected ":" after the value of "${String(value)}"`);
    }
    return { key: value, value: associated };
  }

  private readValue(depth: number): ParameterValue {
    const token = this.next();
    if (token?.type === 'literal') {
      return token.value;
    }
    if (token?.type === 'open') {
      if (depth + 1 > MAX_NESTING) {
        throw new ParseError(`Lists may only be nested ${MAX_NESTING} level deep`);
      }
      return this.readList(depth + 1).map((entry) => entry.value);
    }
    throw new ParseError(`Expected a value but found ${describeToken(token)}`);
  }

  private expect(type: Token['type']): void {
    const token = this.next();
    if (token?.type !== type) {
      throw new ParseError(`Expected ${type} but found ${describeToken(token)}`);
    }
  }

  private peek(): Token | undefined {
    return this.tokens[this.pos];
  }

  private next(): Token | undefined {
    return this.tokens[this.pos++];
  }
}

/**
 * Render a ParameterList back to argument text that evaluates to the same list.
 * Strings are always quoted so they never coerce to numbers or booleans.
 */
export function renderParameters(params: ParameterList): string {
  const parts = params.positional.map(renderValue);
  for (const [key, value] of Object.entries(params.keyed)) {
    const renderedKey = BARE_KEY_PATTERN.test(key) && !BOOLEAN_PATTERN.test(key) ? key : quote(key);
    parts.push(`${renderedKey}: ${renderValue(value)}`);
  }
  return parts.join(', ');
}

function renderValue(value: ParameterValue): string {
  if (Array.isArray(value)) {
    return `(${value.map(renderValue).join(', ')})`;
  }
  if (typeof value === 'string') {
    return quote(value);
  }
  return String(value);
}

function quote(value: string): string {
  // No quote can close after a trailing backslash; such values only come from barewords.
  if (value.endsWith('\\') && isPlainBareword(value)) return value;
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"')) return `"${value}"`;
  return `'${value.split("'").join("\\'")}'`;
}

function isPlainBareword(value: string): boolean {
  return (
    value !== '' &&
    value === value.trim() &&
    !BAREWORD_UNSAFE.test(value) &&
    !BOOLEAN_PATTERN.test(value) &&
    !NUMBER_PATTERN.test(value)
  );
}
