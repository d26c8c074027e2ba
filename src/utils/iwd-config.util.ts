import { IwdConfig } from '../interfaces/network.interface';

/**
 * Renders iwd settings as text: a [Name] header per section followed by
 * Key=Value lines, sections separated by a blank line
 * @param config Sections in write order
 * @returns File contents, empty for a config without sections
 */
export function serializeIwdConfig(config: IwdConfig): string {
  if (config.sections.length === 0) {
    return '';
  }

  return config.sections
    .map(section => [
      `[${section.name}]`,
      ...section.entries.map(([key, value]) => `${key}=${value}`)
    ].join('\n'))
    .join('\n\n') + '\n';
}
