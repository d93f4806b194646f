/**
 * LLAMA-16 Symbol Table
 *
 * Labels are stored lower-cased, so lookups are case-insensitive. Iteration
 * follows definition order.
 */

import { AssemblyError, AssemblyErrorKind } from './errors.js';

export class SymbolTable {
  private symbols: Map<string, number> = new Map();

  get size(): number {
    return this.symbols.size;
  }

  has(name: string): boolean {
    return this.symbols.has(name.toLowerCase());
  }

  define(name: string, address: number, line: number): void {
    const symbol = name.toLowerCase();
    if (this.symbols.has(symbol)) {
      throw new AssemblyError(AssemblyErrorKind.DUPLICATE_LABEL, `Duplicate label: "${name}"`, line);
    }
    this.symbols.set(symbol, address);
  }

  resolve(name: string, line: number): number {
    const address = this.symbols.get(name.toLowerCase());
    if (address === undefined) {
      throw new AssemblyError(AssemblyErrorKind.UNDEFINED_LABEL, `Undefined label "${name}"`, line);
    }
    return address;
  }

  entries(): IterableIterator<[string, number]> {
    return this.symbols.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, number]> {
    return this.entries();
  }

  toString(): string {
    const parts: string[] = [];
    for (const [name, address] of this.symbols) {
      parts.push(`${name}: 0x${address.toString(16).padStart(4, '0')}`);
    }
    return `{${parts.join(', ')}}`;
  }
}
