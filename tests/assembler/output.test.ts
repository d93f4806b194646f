import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  formatSymbolTable,
  formatHexDump,
  writeBinaryFile,
  writeSymbolFile,
} from '../../src/assembler/output.js';
import { SymbolTable } from '../../src/assembler/symbols.js';

describe('Output Writer', () => {
  describe('formatSymbolTable', () => {
    it('should format one line per symbol in definition order', () => {
      const symbols = new SymbolTable();
      symbols.define('start', 0x4000, 1);
      symbols.define('msg', 0x400a, 2);
      expect(formatSymbolTable(symbols)).toBe('4000 START\n400A MSG\n');
    });

    it('should truncate names to 16 characters', () => {
      const symbols = new SymbolTable();
      symbols.define('averyveryverylonglabel', 0x4001, 1);
      expect(formatSymbolTable(symbols)).toBe('4001 AVERYVERYVERYLON\n');
    });

    it('should be empty for an empty table', () => {
      expect(formatSymbolTable(new SymbolTable())).toBe('');
    });
  });

  describe('formatHexDump', () => {
    it('should print offsets, bytes and ascii', () => {
      const dump = formatHexDump(new Uint8Array([0x48, 0x69, 0x00, 0xf0]));
      expect(dump.startsWith('00000000: 48 69  00 f0  ')).toBe(true);
      expect(dump.endsWith('|Hi..            |')).toBe(true);
    });

    it('should start a new row every 16 bytes', () => {
      const dump = formatHexDump(new Uint8Array(20));
      const rows = dump.split('\n');
      expect(rows).toHaveLength(2);
      expect(rows[1].startsWith('00000008: ')).toBe(true);
    });

    it('should count row addresses in words from the origin', () => {
      const rows = formatHexDump(new Uint8Array(20), 0x4000).split('\n');
      expect(rows[0].startsWith('00004000: ')).toBe(true);
      expect(rows[1].startsWith('00004008: ')).toBe(true);
    });
  });

  describe('files', () => {
    const testDir = join(tmpdir(), 'llama16-output-test-' + Date.now());

    beforeEach(() => {
      mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('should write the binary verbatim', () => {
      const path = join(testDir, 'prog.OUT');
      const written = writeBinaryFile(path, new Uint8Array([0x00, 0xf0]));
      expect(written).toBe(2);
      expect(Array.from(readFileSync(path))).toEqual([0x00, 0xf0]);
    });

    it('should write the symbol file', () => {
      const path = join(testDir, 'prog.SYM');
      const symbols = new SymbolTable();
      symbols.define('loop', 0x4002, 1);
      expect(writeSymbolFile(path, symbols)).toBe(1);
      expect(readFileSync(path, 'utf-8')).toBe('4002 LOOP\n');
    });

    it('should skip the symbol file for an empty table', () => {
      const path = join(testDir, 'empty.SYM');
      expect(writeSymbolFile(path, new SymbolTable())).toBe(0);
      expect(existsSync(path)).toBe(false);
    });
  });
});
