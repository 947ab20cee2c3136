import type { AuthType, WifiConfig, WifiPassword } from '../interfaces/wifi.interface';
import { toMecard } from './mecard.util';

const MAX_SSID_BYTES = 32;
const WPA_PASSPHRASE_MIN = 8;
const WPA_PASSPHRASE_MAX = 63;
const WPA_PSK_HEX_LENGTH = 64;
const WEP_KEY_LENGTHS = [5, 13];
const WEP_HEX_KEY_LENGTHS = [10, 26];

export type ValidationResult<E> = { ok: true } | { ok: false; error: E };

export type RecordResult =
  | { ok: true; record: string }
  | { ok: false; error: WifiValidationError };

/**
 * Base class for every credential validation failure.
 * Messages are written for a human operator and never include the password.
 */
export class WifiValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WifiValidationError';
  }
}

export type SsidErrorReason = 'empty' | 'too-long';

export class SsidError extends WifiValidationError {
  constructor(
    public readonly reason: SsidErrorReason,
    public readonly byteLength: number,
  ) {
    super(
      reason === 'empty'
        ? 'SSID cannot be empty.'
        : `SSID is too long (${byteLength} bytes). It must be between 1 and ${MAX_SSID_BYTES} bytes.`,
    );
    this.name = 'SsidError';
  }
}

export interface PasswordDiagnostic {
  byteLength: number;
  unit: 'byte' | 'bytes';
  kind: 'hex' | 'string';
  charset: 'ASCII' | 'non-ASCII';
}

export type PasswordErrorReason = 'unexpected' | 'invalid-for-type';

export class PasswordError extends WifiValidationError {
  constructor(
    public readonly reason: PasswordErrorReason,
    public readonly authType: AuthType,
    message: string,
    public readonly diagnostic?: PasswordDiagnostic,
  ) {
    super(message);
    this.name = 'PasswordError';
  }
}

/** Length in UTF-8 bytes, which is what scanners count */
export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

function isHex(text: string): boolean {
  return /^[0-9a-fA-F]+$/.test(text);
}

function isPrintableAscii(text: string): boolean {
  return /^[\x20-\x7E]+$/.test(text);
}

/**
 * Summarise a password without revealing it
 * @param value Password, absent for open networks
 */
export function describePassword(value?: string): PasswordDiagnostic {
  const text = value ?? '';
  const length = byteLength(text);
  return {
    byteLength: length,
    unit: length === 1 ? 'byte' : 'bytes',
    kind: isHex(text) ? 'hex' : 'string',
    charset: isPrintableAscii(text) ? 'ASCII' : 'non-ASCII',
  };
}

export function validateSsid(ssid: string): ValidationResult<SsidError> {
  const length = byteLength(ssid);
  if (length === 0) {
    return { ok: false, error: new SsidError('empty', 0) };
  }
  if (length > MAX_SSID_BYTES) {
    return { ok: false, error: new SsidError('too-long', length) };
  }
  return { ok: true };
}

/**
 * Check a password against the rules of its authentication type.
 *
 * - nopass: no password at all
 * - WPA: 8-63 printable ASCII characters, or a 64 digit hex PSK
 * - WEP: a 5 or 13 byte key, or its 10 or 26 digit hex form
 */
export function validatePassword(password: WifiPassword): ValidationResult<PasswordError> {
  const text = password.value ?? '';
  const info = describePassword(text);
  const current = `current: ${info.byteLength} ${info.unit} ${info.kind}`;
  const hex = text.length > 0 && isHex(text);
  const printable = text.length > 0 && isPrintableAscii(text);

  switch (password.authType) {
    case 'nopass':
      if (text.length > 0) {
        return {
          ok: false,
          error: new PasswordError('unexpected', 'nopass', "Password should not be provided for 'nopass'."),
        };
      }
      return { ok: true };

    case 'WPA': {
      const validPassphrase =
        info.byteLength >= WPA_PASSPHRASE_MIN && info.byteLength <= WPA_PASSPHRASE_MAX && printable;
      const validPsk = info.byteLength === WPA_PSK_HEX_LENGTH && hex;
      if (!validPassphrase && !validPsk) {
        return {
          ok: false,
          error: new PasswordError(
            'invalid-for-type',
            'WPA',
            `WPA passphrase must be 8-63 printable ASCII characters, or 64 hex digits (${current}, ${info.charset}).`,
            info,
          ),
        };
      }
      return { ok: true };
    }

    case 'WEP': {
      const validKey = WEP_KEY_LENGTHS.includes(info.byteLength);
      const validHexKey = WEP_HEX_KEY_LENGTHS.includes(info.byteLength) && hex;
      if (!validKey && !validHexKey) {
        return {
          ok: false,
          error: new PasswordError(
            'invalid-for-type',
            'WEP',
            `WEP password must be 5 or 13 characters, or 10 or 26 hex digits (${current}).`,
            info,
          ),
        };
      }
      return { ok: true };
    }
  }
}

/**
 * Validate a whole configuration. The SSID is checked before the password
 * and the first failure is returned.
 */
export function validateWifi(config: WifiConfig): ValidationResult<WifiValidationError> {
  const ssid = validateSsid(config.ssid);
  if (!ssid.ok) {
    return ssid;
  }
  return validatePassword(config.password);
}

/**
 * Validate and, only on success, encode a configuration
 */
export function buildWifiRecord(config: WifiConfig): RecordResult {
  const result = validateWifi(config);
  if (!result.ok) {
    return result;
  }
  return { ok: true, record: toMecard(config) };
}
