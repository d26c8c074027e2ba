// ANSI color codes for terminal output
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m'
};

// Icons for different status elements
export const icons = {
  profile: '📄',
  folder: '📁',
  converted: '✅',
  failed: '❌'
};

/**
 * Colorize text for terminal output
 * @param text Text to colorize
 * @param color Color to apply
 * @returns Colorized string
 */
export function colorize(text: string, color: keyof typeof colors): string {
  return colors[color] + text + colors.reset;
}

/**
 * Format a label-value pair with optional icon and color
 * @param label The label text
 * @param value The value text
 * @param icon Optional icon to prepend
 * @param valueColor Optional color for the value
 * @returns Formatted string
 */
export function formatStatusLine(
  label: string,
  value: string,
  icon?: keyof typeof icons,
  valueColor?: keyof typeof colors
): string {
  const iconStr = icon ? `${icons[icon]} ` : '';
  const valueStr = valueColor ? colorize(value, valueColor) : value;
  return `${iconStr}${colorize(label + ':', 'bold')} ${valueStr}`;
}
