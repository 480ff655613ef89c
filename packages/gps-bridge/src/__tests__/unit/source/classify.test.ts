import { describe, test, expect } from 'vitest';
import { classifySource, isSpecialSource } from '../../../source/classify.js';

describe('classifySource', () => {
  test.each([
    ['/dev/ttyUSB0'],
    ['/dev/cu.usbserial'],
    ['usb:'],
    ['usb:0'],
    ['COM3'],
    ['COM12'],
    ['COM1:'],
    ['COM 3'],
    ['COM+3'],
    ['COM\t7'],
  ])('%s is special', (path) => {
    expect(classifySource(path)).toBe('special');
  });

  test.each([
    ['COM0'],
    ['COMx'],
    ['COM-3'],
    ['COM +0'],
    ['COM'],
    ['com3'],
    ['/tmp/track.gdb'],
    ['relative/dev/ttyUSB0'],
    ['/vsimem/track.gdb'],
    ['USB:'],
  ])('%s is regular', (path) => {
    expect(classifySource(path)).toBe('regular');
  });

  test('isSpecialSource agrees with classifySource', () => {
    expect(isSpecialSource('/dev/ttyS0')).toBe(true);
    expect(isSpecialSource('track.gpx')).toBe(false);
  });
});
