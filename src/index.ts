export {
  AUTH_TYPES,
  DEFAULT_AUTH_TYPE,
  OUTPUT_FORMATS,
  ERROR_CORRECTION_LEVELS,
} from './interfaces/wifi.interface';
export type {
  AuthType,
  WifiPassword,
  WifiConfig,
  OutputFormat,
  ErrorCorrectionLevel,
  RenderOptions,
} from './interfaces/wifi.interface';

export { escapeMecard, toMecard } from './utils/mecard.util';
export {
  WifiValidationError,
  SsidError,
  PasswordError,
  byteLength,
  describePassword,
  validateSsid,
  validatePassword,
  validateWifi,
  buildWifiRecord,
} from './utils/validation.util';
export type {
  ValidationResult,
  RecordResult,
  PasswordDiagnostic,
  SsidErrorReason,
  PasswordErrorReason,
} from './utils/validation.util';

export { WifiQrService, DEFAULT_RENDER_OPTIONS } from './services/wifi-qr.service';
export { ConfigManager, ConfigError } from './utils/config.util';
export { runCli, createProgram, parseAuthType } from './program';
export type { CliIO, OutputStream } from './program';
export type { ProfileList, SavedNetwork } from './utils/config.util';
