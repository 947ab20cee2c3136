export const AUTH_TYPES = ['WEP', 'WPA', 'nopass'] as const;

// Also the token written to the T: field of the record
export type AuthType = typeof AUTH_TYPES[number];

export const DEFAULT_AUTH_TYPE: AuthType = 'WPA';

export interface WifiPassword {
  readonly value?: string; // undefined or '' for open networks
  readonly authType: AuthType;
}

export interface WifiConfig {
  readonly ssid: string;
  readonly password: WifiPassword;
  readonly hidden: boolean;
}

export const OUTPUT_FORMATS = ['ascii', 'svg', 'png'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export const ERROR_CORRECTION_LEVELS = ['L', 'M', 'Q', 'H'] as const;
export type ErrorCorrectionLevel = typeof ERROR_CORRECTION_LEVELS[number];

export interface RenderOptions {
  format: OutputFormat;
  errorCorrectionLevel: ErrorCorrectionLevel;
}
