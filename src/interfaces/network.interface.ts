export type PSKSecurity =
  | { type: 'password'; passphrase: string }
  | { type: 'raw-key'; key: string };

export type Security =
  | { type: 'open' }
  | { type: 'psk'; psk: PSKSecurity };

export interface Network {
  readonly ssid: string;
  readonly security: Security;
}

/**
 * Which SSID characters may appear unescaped in an iwd file name.
 * 'iwd' also allows the space character, 'strict' does not.
 */
export type FileNamePolicy = 'iwd' | 'strict';

export interface IwdConfigSection {
  name: string;
  entries: Array<[string, string]>;
}

export interface IwdConfig {
  sections: IwdConfigSection[];
}
