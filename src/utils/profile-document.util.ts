import { ConversionError, ConversionErrorKind } from './errors.util';

export interface ProfileDocument {
  /** Entries that appear before any [section] header */
  general: Map<string, string>;
  sections: Map<string, Map<string, string>>;
}

const ESCAPES: Record<string, string> = {
  '0': '\0',
  a: '\x07',
  b: '\b',
  t: '\t',
  r: '\r',
  n: '\n'
};

interface LogicalLine {
  number: number;
  text: string;
}

function parseError(lineNumber: number, message: string): ConversionError {
  return new ConversionError(ConversionErrorKind.ParseError, `line ${lineNumber}: ${message}`);
}

function trailingBackslashes(text: string): number {
  let count = 0;
  while (count < text.length && text[text.length - 1 - count] === '\\') {
    count++;
  }
  return count;
}

/**
 * Splits text into lines, joining a line that ends in an unescaped backslash with the next one
 */
function logicalLines(text: string): LogicalLine[] {
  const physical = text.split('\n').map(line => line.endsWith('\r') ? line.slice(0, -1) : line);
  const lines: LogicalLine[] = [];
  let pending: LogicalLine | null = null;

  for (let index = 0; index < physical.length; index++) {
    const joined: string = pending ? pending.text + physical[index] : physical[index];
    const number: number = pending ? pending.number : index + 1;

    if (trailingBackslashes(joined) % 2 === 1) {
      pending = { number, text: joined.slice(0, -1) };
    } else {
      pending = null;
      lines.push({ number, text: joined });
    }
  }

  if (pending) {
    throw parseError(pending.number, 'unexpected end of input after "\\"');
  }
  return lines;
}

/**
 * Reads the value part of a key=value line, resolving quotes and backslash escapes
 * @param raw Everything after the first "="
 * @param lineNumber Used in error details
 */
function readValue(raw: string, lineNumber: number): string {
  const text = raw.trimStart();
  const quote = text[0] === '"' || text[0] === '\'' ? text[0] : null;
  let value = '';
  let significant = 0;

  for (let i = quote ? 1 : 0; i < text.length; i++) {
    const char = text[i];

    if (char === '\\') {
      i++;
      if (i >= text.length) {
        throw parseError(lineNumber, 'unexpected end of line after "\\"');
      }
      value += ESCAPES[text[i]] ?? text[i];
      significant = value.length;
    } else if (quote && char === quote) {
      if (text.slice(i + 1).trim() !== '') {
        throw parseError(lineNumber, 'unexpected text after closing quote');
      }
      return value;
    } else {
      value += char;
      if (quote || char.trim() !== '') {
        significant = value.length;
      }
    }
  }

  if (quote) {
    throw parseError(lineNumber, `unterminated ${quote} quote`);
  }
  return value.slice(0, significant);
}

/**
 * Parses a netctl profile into key/value entries.
 * Comments start with # or ; and only when they open a line.
 * @param text Profile contents
 * @returns General entries plus any named sections
 */
export function parseProfileDocument(text: string): ProfileDocument {
  const document: ProfileDocument = { general: new Map(), sections: new Map() };
  let current = document.general;

  for (const { number, text: line } of logicalLines(text)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      continue;
    }

    if (trimmed.startsWith('[')) {
      const close = trimmed.indexOf(']');
      if (close === -1) {
        throw parseError(number, 'unterminated section header');
      }
      const name = trimmed.slice(1, close).trim();
      const section = document.sections.get(name) ?? new Map<string, string>();
      document.sections.set(name, section);
      current = section;
      continue;
    }

    const eqIdx = line.indexOf('=');
    if (eqIdx === -1) {
      throw parseError(number, 'expected "=" after key');
    }
    const key = line.slice(0, eqIdx).trim();
    if (!key) {
      throw parseError(number, 'missing key before "="');
    }
    current.set(key, readValue(line.slice(eqIdx + 1), number));
  }

  return document;
}
