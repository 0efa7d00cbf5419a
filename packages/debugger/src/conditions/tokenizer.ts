import { ConditionEvaluationError } from './errors.js';

export type Token =
  | { type: 'number'; value: number; position: number }
  | { type: 'string'; value: string; position: number }
  | { type: 'name'; value: string; position: number }
  | { type: 'symbol'; value: string; position: number }
  | { type: 'eof'; position: number };

const TWO_CHAR_SYMBOLS = ['==', '!=', '>=', '<=', '&&', '||'];
const ONE_CHAR_SYMBOLS = '<>+-*/%()[],!.=';
const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

/**
 * Splits a condition expression into tokens. Characters outside the
 * expression alphabet are rejected here, before parsing.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source[index];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (/[0-9]/.test(char) || (char === '.' && /[0-9]/.test(source[index + 1] ?? ''))) {
      const match = /^(?:\d+(?:\.\d+)?|\.\d+)(?:[eE][+-]?\d+)?/.exec(source.slice(index));
      const text = match ? match[0] : char;
      tokens.push({ type: 'number', value: Number(text), position: index });
      index += text.length;
      continue;
    }

    if (char === '"' || char === "'") {
      const { value, end } = readString(source, index);
      tokens.push({ type: 'string', value, position: index });
      index = end;
      continue;
    }

    if (/[A-Za-z_]/.test(char)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(source.slice(index));
      const name = match ? match[0] : char;
      tokens.push({ type: 'name', value: name, position: index });
      index += name.length;
      continue;
    }

    const pair = source.slice(index, index + 2);
    if (TWO_CHAR_SYMBOLS.includes(pair)) {
      tokens.push({ type: 'symbol', value: pair, position: index });
      index += 2;
      continue;
    }

    if (ONE_CHAR_SYMBOLS.includes(char)) {
      tokens.push({ type: 'symbol', value: char, position: index });
      index += 1;
      continue;
    }

    throw ConditionEvaluationError.parse(`Unexpected character '${char}'`, index);
  }

  tokens.push({ type: 'eof', position: source.length });
  return tokens;
}

function readString(
  source: string,
  start: number,
): { value: string; end: number } {
  const quote = source[start];
  let value = '';
  let index = start + 1;

  while (index < source.length) {
    const char = source[index];
    if (char === quote) {
      return { value, end: index + 1 };
    }
    if (char === '\\' && index + 1 < source.length) {
      const escaped = source[index + 1];
      value += ESCAPES[escaped] ?? escaped;
      index += 2;
      continue;
    }
    value += char;
    index += 1;
  }

  throw ConditionEvaluationError.parse('Unterminated string literal', start);
}
