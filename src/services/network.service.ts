import { FileNamePolicy, IwdConfig, Network, PSKSecurity, Security } from '../interfaces/network.interface';
import { derivePskHex } from '../utils/psk.util';

const SAFE_SSID: Record<FileNamePolicy, RegExp> = {
  iwd: /^[A-Za-z0-9_\- ]*$/,
  strict: /^[A-Za-z0-9_-]*$/
};

const SUFFIXES: Record<Security['type'], string> = {
  open: '.open',
  psk: '.psk'
};

export function createNetwork(ssid: string, security: Security): Network {
  return Object.freeze({ ssid, security: Object.freeze(security) });
}

export function openSecurity(): Security {
  return { type: 'open' };
}

export function pskSecurity(psk: PSKSecurity): Security {
  return { type: 'psk', psk };
}

/**
 * Name of the file iwd looks up for this network.
 * SSIDs made only of safe characters are used as-is, anything else becomes
 * "=" followed by the hex encoding of the SSID's bytes.
 * @param network Parsed network
 * @param policy Safe character set to apply
 */
export function networkFileName(network: Network, policy: FileNamePolicy = 'iwd'): string {
  const base = SAFE_SSID[policy].test(network.ssid)
    ? network.ssid
    : '=' + Buffer.from(network.ssid, 'utf8').toString('hex');

  return base + SUFFIXES[network.security.type];
}

/**
 * Builds the iwd settings for a network. A passphrase is written together with the
 * key derived from it so iwd can use either.
 */
export function buildIwdConfig(network: Network): IwdConfig {
  const { security } = network;
  if (security.type === 'open') {
    return { sections: [] };
  }

  const entries: Array<[string, string]> = [];
  switch (security.psk.type) {
    case 'raw-key':
      entries.push(['PreSharedKey', security.psk.key]);
      break;
    case 'password':
      entries.push(['Passphrase', security.psk.passphrase]);
      entries.push(['PreSharedKey', derivePskHex(network.ssid, security.psk.passphrase)]);
      break;
  }

  return { sections: [{ name: 'Security', entries }] };
}
