import crypto from 'crypto';

const ITERATIONS = 4096;
const KEY_LENGTH = 32; // 256 bits
const DIGEST = 'sha1';

/**
 * Derives a WPA pre-shared key (PBKDF2-HMAC-SHA1, SSID as salt)
 * @param ssid Network name, encoded as UTF-8 when given as a string
 * @param passphrase Human passphrase, encoded as UTF-8 when given as a string
 * @returns 32 byte key
 */
export function derivePsk(ssid: string | Buffer, passphrase: string | Buffer): Buffer {
  const salt = typeof ssid === 'string' ? Buffer.from(ssid, 'utf8') : ssid;
  const password = typeof passphrase === 'string' ? Buffer.from(passphrase, 'utf8') : passphrase;

  return crypto.pbkdf2Sync(password, salt, ITERATIONS, KEY_LENGTH, DIGEST);
}

export function derivePskHex(ssid: string | Buffer, passphrase: string | Buffer): string {
  return derivePsk(ssid, passphrase).toString('hex');
}
