import type { WifiConfig } from '../interfaces/wifi.interface';

/**
 * Escape the reserved characters of the MECARD-like WIFI: syntax.
 * `,` `:` `;` and `\` each get a single backslash in front; everything else
 * is copied as-is.
 * @param text Raw field value
 * @returns Value safe to place between field delimiters
 */
export function escapeMecard(text: string): string {
  return text.replace(/[,:;\\]/g, '\\$&');
}

/**
 * Build the WIFI: record for a configuration.
 * Does not validate; run validateWifi first.
 * @param config Network configuration
 * @returns Record in the form WIFI:S:<ssid>;T:<auth>;P:<password>;H:<hidden>;;
 */
export function toMecard(config: WifiConfig): string {
  const ssid = escapeMecard(config.ssid);
  const password = escapeMecard(config.password.value ?? '');
  const hidden = config.hidden ? 'true' : 'false';
  return `WIFI:S:${ssid};T:${config.password.authType};P:${password};H:${hidden};;`;
}
