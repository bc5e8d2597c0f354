import assert from 'node:assert/strict';
import test from 'node:test';

import {
  FRAME_FILE_PATTERN,
  formatFrameName,
  parseFrameIndex,
  parseRationalFps,
} from '../src/cli/utils/videoUtils.js';

test('parseRationalFps parses rational values', () => {
  assert.equal(parseRationalFps('60000/1001'), 60000 / 1001);
  assert.equal(parseRationalFps('24/1'), 24);
});

test('parseRationalFps parses numeric values', () => {
  assert.equal(parseRationalFps('29.97'), 29.97);
});

test('parseRationalFps rejects invalid input', () => {
  assert.throws(() => parseRationalFps('0/0'));
  assert.throws(() => parseRationalFps('0/1'));
  assert.throws(() => parseRationalFps('not-a-number'));
  assert.throws(() => parseRationalFps(''));
});

test('frame names are zero-padded to eight digits', () => {
  assert.equal(FRAME_FILE_PATTERN, 'frame_%08d.png');
  assert.equal(formatFrameName(0), 'frame_00000000.png');
  assert.equal(formatFrameName(1234), 'frame_00001234.png');
  assert.throws(() => formatFrameName(-1), RangeError);
  assert.throws(() => formatFrameName(1.5), RangeError);
  assert.throws(() => formatFrameName(100_000_000), RangeError);
});

test('parseFrameIndex reads the index back and ignores other files', () => {
  assert.equal(parseFrameIndex('frame_00000042.png'), 42);
  assert.equal(parseFrameIndex(formatFrameName(99_999_999)), 99_999_999);
  assert.equal(parseFrameIndex('frame_42.png'), null);
  assert.equal(parseFrameIndex('frame_00000042.jpg'), null);
  assert.equal(parseFrameIndex('.DS_Store'), null);
});
