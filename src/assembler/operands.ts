/**
 * LLAMA-16 Operand Classifier
 *
 * Assigns each operand token a kind and strips its syntax markers.
 */

import { AssemblyError, AssemblyErrorKind } from './errors.js';

/** All register names, in encoding order */
export const REGISTERS = ['a', 'b', 'c', 'd', 'ip', 'sp', 'bp'] as const;

/** Operand 1 may only name these */
export const GENERAL_REGISTERS = REGISTERS.slice(0, 4);

export type RegisterName = (typeof REGISTERS)[number];

export enum OperandKind {
  REGISTER = 'REGISTER',
  IMMEDIATE = 'IMMEDIATE',
  MEMORY = 'MEMORY',
  LABEL = 'LABEL',
}

export interface RegisterOperand {
  kind: OperandKind.REGISTER;
  text: string;
  index: number;
}

export interface ImmediateOperand {
  kind: OperandKind.IMMEDIATE;
  text: string;
}

export interface MemoryOperand {
  kind: OperandKind.MEMORY;
  text: string;
}

export interface LabelOperand {
  kind: OperandKind.LABEL;
  text: string;
}

export type Operand = RegisterOperand | ImmediateOperand | MemoryOperand | LabelOperand;

function isRegisterName(name: string): name is RegisterName {
  return REGISTERS.some(reg => reg === name);
}

export function registerIndex(name: string, line: number): number {
  const reg = name.toLowerCase();
  if (!isRegisterName(reg)) {
    throw new AssemblyError(AssemblyErrorKind.INVALID_REGISTER, `Invalid register "${reg}"`, line);
  }
  return REGISTERS.indexOf(reg);
}

/**
 * Classify a single operand. `registers` is the set of names that count as
 * registers in this position; anything else that is not bracketed or
 * prefixed with `#` is a label reference.
 */
export function classifyOperand(
  raw: string,
  registers: readonly string[],
  line: number
): Operand | undefined {
  const text = raw.trim().toLowerCase();
  if (text === '') {
    return undefined;
  }

  if (text.startsWith('[')) {
    return { kind: OperandKind.MEMORY, text: text.replace(/[[\]]/g, '') };
  }
  if (text.startsWith('#')) {
    return { kind: OperandKind.IMMEDIATE, text: text.replace(/#/g, '') };
  }
  if (registers.includes(text)) {
    return { kind: OperandKind.REGISTER, text, index: registerIndex(text, line) };
  }
  return { kind: OperandKind.LABEL, text };
}

/** Base-10 integer literal, shared by immediates and `.data` */
export const DECIMAL_LITERAL = /^[+-]?\d+$/;

/** Parse a base-10 integer literal with an optional sign */
export function parseDecimal(text: string): number | undefined {
  if (!DECIMAL_LITERAL.test(text)) {
    return undefined;
  }
  return parseInt(text, 10);
}

/** Parse a memory address literal, optionally prefixed with 0x */
export function parseHexAddress(text: string): number | undefined {
  if (!/^(0x)?[0-9a-f]+$/i.test(text)) {
    return undefined;
  }
  return parseInt(text.replace(/^0x/i, ''), 16);
}
