import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import { WifiQrService } from '../services/wifi-qr.service';
import { PasswordError, SsidError } from '../utils/validation.util';

const RECORD = 'WIFI:S:SSID;T:WPA;P:PASSWORD;H:false;;';
const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe('WifiQrService.render', () => {
  const service = new WifiQrService();

  test('renders half-block terminal text', async () => {
    const output = await service.render(RECORD, { format: 'ascii', errorCorrectionLevel: 'M' });
    assert.equal(typeof output, 'string');
    const lines = String(output).split('\n');
    assert.match(lines[0], /^▄+$/);
    assert.ok(lines[1].startsWith('█'));
  });

  test('higher error correction needs a larger symbol', async () => {
    const low = String(await service.render(RECORD, { format: 'ascii', errorCorrectionLevel: 'L' }));
    const high = String(await service.render(RECORD, { format: 'ascii', errorCorrectionLevel: 'H' }));
    assert.ok(high.split('\n')[0].length > low.split('\n')[0].length);
  });

  test('applies the error correction level of each call', async () => {
    const render = async (errorCorrectionLevel: 'L' | 'H') =>
      String(await service.render(RECORD, { format: 'ascii', errorCorrectionLevel }));
    const low = await render('L');
    const high = await render('H');
    assert.notEqual(high, low);
    assert.equal(await render('L'), low);
  });

  test('renders SVG markup', async () => {
    const output = await service.render(RECORD, { format: 'svg', errorCorrectionLevel: 'M' });
    assert.equal(typeof output, 'string');
    assert.ok(String(output).startsWith('<svg'));
    assert.ok(String(output).includes('width="200"'));
  });

  test('renders a square PNG', async () => {
    const output = await service.render(RECORD, { format: 'png', errorCorrectionLevel: 'M' });
    if (!Buffer.isBuffer(output)) {
      throw new Error('expected PNG bytes');
    }
    assert.deepEqual([...output.subarray(0, 8)], PNG_SIGNATURE);
    const width = output.readUInt32BE(16);
    const height = output.readUInt32BE(20);
    assert.equal(width, height);
    assert.equal(width % 10, 0);
  });
});

describe('WifiQrService.generate', () => {
  const service = new WifiQrService();

  test('renders a valid configuration', async () => {
    const output = await service.generate(
      { ssid: 'SSID', password: { value: 'PASSWORD', authType: 'WPA' }, hidden: false },
      { format: 'svg', errorCorrectionLevel: 'M' },
    );
    assert.ok(String(output).startsWith('<svg'));
  });

  test('rejects an invalid SSID', async () => {
    await assert.rejects(
      service.generate({ ssid: 'a'.repeat(33), password: { value: 'PASSWORD', authType: 'WPA' }, hidden: false }),
      SsidError,
    );
  });

  test('rejects a password on an open network', async () => {
    await assert.rejects(
      service.generate({ ssid: 'Cafe', password: { value: 'secret', authType: 'nopass' }, hidden: false }),
      PasswordError,
    );
  });
});
