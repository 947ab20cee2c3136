// Loaded as the module object itself: setErrorLevel stores the level on `this`
import qrcode = require('qrcode-terminal');
import * as QRCode from 'qrcode';
import type {
  ErrorCorrectionLevel,
  RenderOptions,
  WifiConfig
} from '../interfaces/wifi.interface';
import { buildWifiRecord } from '../utils/validation.util';

export const DEFAULT_RENDER_OPTIONS: RenderOptions = {
  format: 'ascii',
  errorCorrectionLevel: 'M',
};

// Quiet zone in modules around the symbol
const QUIET_ZONE = 4;
const PNG_SCALE = 10;
const SVG_MIN_WIDTH = 200;

export class WifiQrService {
  /**
   * Validate, encode and render a network configuration.
   * @throws WifiValidationError if the SSID or password is rejected
   */
  async generate(config: WifiConfig, options: RenderOptions = DEFAULT_RENDER_OPTIONS): Promise<string | Buffer> {
    const result = buildWifiRecord(config);
    if (!result.ok) {
      throw result.error;
    }
    return this.render(result.record, options);
  }

  /**
   * Render an already encoded record
   * @returns Text for ascii and svg, PNG bytes for png
   */
  async render(record: string, options: RenderOptions = DEFAULT_RENDER_OPTIONS): Promise<string | Buffer> {
    switch (options.format) {
      case 'ascii':
        return this.renderTerminal(record, options.errorCorrectionLevel);
      case 'svg':
        return QRCode.toString(record, {
          type: 'svg',
          errorCorrectionLevel: options.errorCorrectionLevel,
          margin: QUIET_ZONE,
          width: SVG_MIN_WIDTH,
        });
      case 'png':
        return QRCode.toBuffer(record, {
          type: 'png',
          errorCorrectionLevel: options.errorCorrectionLevel,
          margin: QUIET_ZONE,
          scale: PNG_SCALE,
        });
    }
  }

  private renderTerminal(record: string, level: ErrorCorrectionLevel): Promise<string> {
    return new Promise((resolve) => {
      qrcode.setErrorLevel(level);
      qrcode.generate(record, { small: true }, resolve);
    });
  }
}
