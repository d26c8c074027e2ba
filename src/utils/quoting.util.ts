import { ConversionError, ConversionErrorKind } from './errors.util';

export interface QuotedString {
  value: string;
  /** False when the value carried netctl's leading `"` marker for a literal key */
  quoted: boolean;
}

/**
 * Reads a value following netctl's special quoting rules (see netctl.profile(5)).
 * A value beginning with `"` is an already encoded literal: the marker is stripped
 * and the value is reported as not quoted. Anything else is plain text.
 * @param entries Parsed profile entries
 * @param key Entry to read
 */
export function getQuotedString(entries: ReadonlyMap<string, string>, key: string): QuotedString {
  const contents = entries.get(key);
  if (contents === undefined) {
    throw new ConversionError(ConversionErrorKind.MissingKeys);
  }

  if (contents.startsWith('"')) {
    return { value: contents.slice(1), quoted: false };
  }
  return { value: contents, quoted: true };
}
