// ANSI color codes for terminal output
export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',

  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export const icons = {
  hidden: '🙈',
};

export type Color = keyof typeof colors;
export type Icon = keyof typeof icons;

/**
 * Whether a stream should receive ANSI colors
 * @param stream Output stream, colors are only used on a TTY
 */
export function supportsColor(stream: { isTTY?: boolean }): boolean {
  return !process.env.NO_COLOR && stream.isTTY === true;
}

/**
 * Colorize text for terminal output
 * @param text Text to colorize
 * @param color Color to apply
 * @param enabled Return the text untouched when false
 */
export function colorize(text: string, color: Color, enabled = true): string {
  return enabled ? colors[color] + text + colors.reset : text;
}

/**
 * Format a label-value pair with optional icon and color
 */
export function formatStatusLine(
  label: string,
  value: string,
  icon?: Icon,
  valueColor?: Color,
  enabled = true
): string {
  const iconStr = icon ? `${icons[icon]} ` : '';
  const valueStr = valueColor ? colorize(value, valueColor, enabled) : value;
  return `${iconStr}${colorize(label + ':', 'bold', enabled)} ${valueStr}`;
}

/**
 * Creates a boxed section header
 * @param title The section title
 */
export function formatSectionHeader(title: string, enabled = true): string {
  const line = '─'.repeat(title.length + 4);
  return colorize(`┌${line}┐`, 'cyan', enabled) +
         '\n' + colorize(`│  ${title}  │`, 'cyan', enabled) +
         '\n' + colorize(`└${line}┘`, 'cyan', enabled);
}

export function formatError(message: string, enabled = true): string {
  return `${colorize('Error:', 'red', enabled)} ${message}`;
}
