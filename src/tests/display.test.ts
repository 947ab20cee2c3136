import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import { colorize, formatError, formatSectionHeader, formatStatusLine, supportsColor } from '../utils/display.util';

describe('display helpers', () => {
  test('colorize wraps text in ANSI codes', () => {
    assert.equal(colorize('ok', 'red'), '\x1b[31mok\x1b[0m');
    assert.equal(colorize('ok', 'red', false), 'ok');
  });

  test('formatStatusLine without colors', () => {
    assert.equal(formatStatusLine('Hidden', 'yes', 'hidden', 'yellow', false), '🙈 Hidden: yes');
    assert.equal(formatStatusLine('SSID', 'Home', undefined, undefined, false), 'SSID: Home');
  });

  test('formatSectionHeader draws a box around the title', () => {
    assert.equal(formatSectionHeader('AB', false), '┌──────┐\n│  AB  │\n└──────┘');
  });

  test('formatError prefixes the message', () => {
    assert.equal(formatError('bad input', false), 'Error: bad input');
  });

  test('colors are only used on a TTY', () => {
    assert.equal(supportsColor({}), false);
    assert.equal(supportsColor({ isTTY: false }), false);
  });
});
