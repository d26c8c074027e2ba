import { Readable } from 'stream';
import { TextDecoder } from 'util';
import { Network, Security } from '../interfaces/network.interface';
import { ConversionError, ConversionErrorKind } from '../utils/errors.util';
import { parseProfileDocument } from '../utils/profile-document.util';
import { getQuotedString } from '../utils/quoting.util';
import { createNetwork, openSecurity, pskSecurity } from './network.service';

const utf8 = new TextDecoder('utf-8', { fatal: true });

function decodeProfile(input: Buffer): string {
  try {
    return utf8.decode(input);
  } catch (error) {
    if (error instanceof TypeError) {
      throw new ConversionError(ConversionErrorKind.ParseError, 'invalid UTF-8 in profile');
    }
    throw error;
  }
}

function readSecurity(entries: ReadonlyMap<string, string>): Security {
  switch (entries.get('Security') ?? 'none') {
    case 'none':
      return openSecurity();
    case 'wpa': {
      const { value, quoted } = getQuotedString(entries, 'Key');
      return pskSecurity(quoted
        ? { type: 'password', passphrase: value }
        : { type: 'raw-key', key: value });
    }
    default:
      throw new ConversionError(ConversionErrorKind.Unsupported);
  }
}

/**
 * Parses a netctl profile into a network.
 * The Connection type is checked before anything else, so a profile that is not
 * wireless always fails with NotWireless. An empty ESSID counts as missing.
 * @param input Profile contents
 * @throws ConversionError
 */
export function parseNetwork(input: string | Buffer): Network {
  const text = typeof input === 'string' ? input : decodeProfile(input);
  const entries = parseProfileDocument(text).general;

  if (entries.get('Connection') !== 'wireless') {
    throw new ConversionError(ConversionErrorKind.NotWireless);
  }

  const security = readSecurity(entries);

  const ssid = entries.get('ESSID');
  if (!ssid) {
    throw new ConversionError(ConversionErrorKind.MissingSSID);
  }
  return createNetwork(ssid, security);
}

/**
 * Buffers a byte stream and parses it as a netctl profile
 */
export async function readNetwork(stream: Readable): Promise<Network> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Buffer.from(chunk));
  }
  return parseNetwork(Buffer.concat(chunks));
}
