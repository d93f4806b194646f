/**
 * LLAMA-16 Output Writer
 */

import { writeFileSync } from 'fs';
import type { SymbolTable } from './symbols.js';

const SYMBOL_NAME_LENGTH = 16;

export function writeBinaryFile(path: string, bytes: Uint8Array): number {
  writeFileSync(path, bytes);
  return bytes.length;
}

/**
 * One `XXXX NAME` line per symbol, in definition order.
 */
export function formatSymbolTable(symbols: SymbolTable): string {
  const lines: string[] = [];
  for (const [name, address] of symbols) {
    const hex = address.toString(16).toUpperCase().padStart(4, '0');
    lines.push(`${hex} ${name.slice(0, SYMBOL_NAME_LENGTH).toUpperCase()}\n`);
  }
  return lines.join('');
}

/**
 * Write the symbol listing. An empty table writes no file.
 */
export function writeSymbolFile(path: string, symbols: SymbolTable): number {
  if (symbols.size === 0) {
    return 0;
  }
  writeFileSync(path, formatSymbolTable(symbols), 'utf-8');
  return symbols.size;
}

/**
 * Hex dump of the image. Row addresses count 16-bit words from `origin`,
 * matching the symbol listing.
 */
export function formatHexDump(bytes: Uint8Array, origin: number = 0): string {
  const lines: string[] = [];

  for (let offset = 0; offset < bytes.length; offset += 16) {
    const line: string[] = [];

    // Address
    line.push((origin + offset / 2).toString(16).padStart(8, '0'));
    line.push(': ');

    const hexParts: string[] = [];
    const asciiParts: string[] = [];

    for (let i = 0; i < 16; i++) {
      if (offset + i < bytes.length) {
        const byte = bytes[offset + i];
        hexParts.push(byte.toString(16).padStart(2, '0'));
        asciiParts.push(byte >= 32 && byte < 127 ? String.fromCharCode(byte) : '.');
      } else {
        hexParts.push('  ');
        asciiParts.push(' ');
      }

      // Extra space between words
      if (i % 2 === 1 && i < 15) {
        hexParts.push('');
      }
    }

    line.push(hexParts.join(' '));
    line.push('  |');
    line.push(asciiParts.join(''));
    line.push('|');

    lines.push(line.join(''));
  }

  return lines.join('\n');
}
