import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import { escapeMecard, toMecard } from '../utils/mecard.util';
import { buildWifiRecord, SsidError } from '../utils/validation.util';

describe('escapeMecard', () => {
  test('escapes each delimiter with one backslash', () => {
    assert.equal(escapeMecard(','), '\\,');
    assert.equal(escapeMecard(':'), '\\:');
    assert.equal(escapeMecard(';'), '\\;');
    assert.equal(escapeMecard('\\'), '\\\\');
  });

  test('escapes delimiters inside text', () => {
    assert.equal(escapeMecard('Example:SSID'), 'Example\\:SSID');
    assert.equal(escapeMecard('A;B,C\\D'), 'A\\;B\\,C\\\\D');
    assert.equal(escapeMecard('::'), '\\:\\:');
  });

  test('leaves other characters untouched', () => {
    const untouched = ['', '\t', '\n', ' ', '!', '"', '#', '-', "'", '+', '.', '/', '0', '9', '<', '>', '@', 'A', 'Z', '[', ']', 'a', 'z', 'あ', '☕️', '⚡'];
    for (const input of untouched) {
      assert.equal(escapeMecard(input), input, `${JSON.stringify(input)} should pass through`);
    }
  });

  test('keeps multi-byte text in order around escapes', () => {
    assert.equal(escapeMecard('カフェ;2F'), 'カフェ\\;2F');
    assert.equal(escapeMecard('🦀,🚀'), '🦀\\,🚀');
  });

  test('only grows by one character per delimiter', () => {
    const input = 'a:b;c,d\\e:f';
    const escaped = escapeMecard(input);
    assert.equal(escaped.length, input.length + 5);
    assert.equal(escaped.replace(/\\([,:;\\])/g, '$1'), input);
  });
});

describe('toMecard', () => {
  test('encodes a WPA network', () => {
    const record = toMecard({ ssid: 'SSID', password: { value: 'PASSWORD', authType: 'WPA' }, hidden: false });
    assert.equal(record, 'WIFI:S:SSID;T:WPA;P:PASSWORD;H:false;;');
  });

  test('keeps an empty password field for open networks', () => {
    const record = toMecard({ ssid: 'Cafe', password: { authType: 'nopass' }, hidden: true });
    assert.equal(record, 'WIFI:S:Cafe;T:nopass;P:;H:true;;');
  });

  test('escapes the SSID and password', () => {
    const record = toMecard({ ssid: 'My;Net', password: { value: 'p@ss:word,1', authType: 'WPA' }, hidden: false });
    assert.equal(record, 'WIFI:S:My\\;Net;T:WPA;P:p@ss\\:word\\,1;H:false;;');
  });

  test('writes the WEP token', () => {
    const record = toMecard({ ssid: 'Old', password: { value: 'abcde', authType: 'WEP' }, hidden: false });
    assert.equal(record, 'WIFI:S:Old;T:WEP;P:abcde;H:false;;');
  });

  test('is deterministic', () => {
    const config = { ssid: 'ネット', password: { value: 'パスワード', authType: 'WPA' as const }, hidden: true };
    assert.equal(toMecard(config), toMecard({ ...config }));
  });
});

describe('buildWifiRecord', () => {
  test('returns the record for a valid configuration', () => {
    const result = buildWifiRecord({ ssid: 'SSID', password: { value: 'PASSWORD', authType: 'WPA' }, hidden: false });
    assert.deepEqual(result, { ok: true, record: 'WIFI:S:SSID;T:WPA;P:PASSWORD;H:false;;' });
  });

  test('returns the validation error instead of a record', () => {
    const result = buildWifiRecord({ ssid: '', password: { value: 'PASSWORD', authType: 'WPA' }, hidden: false });
    assert.equal(result.ok, false);
    assert.equal('record' in result, false);
    assert.ok(!result.ok && result.error instanceof SsidError);
  });
});
