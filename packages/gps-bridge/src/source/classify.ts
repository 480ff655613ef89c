/**
 * Source classification
 *
 * Device nodes, USB handles and serial ports are handed to the converter
 * as-is; the bridge never opens them itself.
 */

import type { SourceKind } from '../core/types.js';

// COM followed by a positive number, optionally spaced or signed ("COM 3", "COM+3")
const SERIAL_PORT = /^COM\s*([+-]?\d+)/;

export function isSpecialSource(path: string): boolean {
  if (path.startsWith('/dev/') || path.startsWith('usb:')) {
    return true;
  }

  const port = SERIAL_PORT.exec(path);
  return port !== null && parseInt(port[1], 10) > 0;
}

export function classifySource(path: string): SourceKind {
  return isSpecialSource(path) ? 'special' : 'regular';
}
