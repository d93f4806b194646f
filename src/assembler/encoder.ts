/**
 * LLAMA-16 Instruction Encoder
 *
 * Instruction word layout:
 *
 *   15..12  opcode
 *   11..8   operand 1 field
 *    7..4   operand 2 memory/label marker
 *    3..0   operand 2 register index
 *
 * The opcode word is followed by up to two trailing words carrying an
 * immediate value, a label address or a memory address.
 */

import { AssemblyError, AssemblyErrorKind } from './errors.js';
import { OperandKind, type Operand } from './operands.js';
import type { InstructionStatement } from './tokenizer.js';

export enum Mnemonic {
  MV = 'mv',
  IO = 'io',
  PUSH = 'push',
  POP = 'pop',
  ADD = 'add',
  SUB = 'sub',
  INC = 'inc',
  DEC = 'dec',
  AND = 'and',
  OR = 'or',
  NOT = 'not',
  CMP = 'cmp',
  CALL = 'call',
  JNZ = 'jnz',
  RET = 'ret',
  HLT = 'hlt',
}

export enum InstructionFormat {
  /** No operands, fixed word */
  NONE = 'NONE',
  /** One operand, encoded in the operand 1 field */
  ONE = 'ONE',
  /** Two operands */
  TWO = 'TWO',
  /** Operand 1 plus an `in`/`out` port keyword */
  PORT = 'PORT',
}

interface InstructionInfo {
  opcode: number;
  format: InstructionFormat;
  /** Operand 1 must be writable */
  destination?: boolean;
}

export const INSTRUCTIONS: Record<Mnemonic, InstructionInfo> = {
  [Mnemonic.MV]: { opcode: 0x0, format: InstructionFormat.TWO },
  [Mnemonic.IO]: { opcode: 0x1, format: InstructionFormat.PORT },
  [Mnemonic.PUSH]: { opcode: 0x2, format: InstructionFormat.ONE },
  [Mnemonic.POP]: { opcode: 0x3, format: InstructionFormat.ONE, destination: true },
  [Mnemonic.ADD]: { opcode: 0x4, format: InstructionFormat.TWO },
  [Mnemonic.SUB]: { opcode: 0x5, format: InstructionFormat.TWO },
  [Mnemonic.INC]: { opcode: 0x6, format: InstructionFormat.ONE, destination: true },
  [Mnemonic.DEC]: { opcode: 0x7, format: InstructionFormat.ONE, destination: true },
  [Mnemonic.AND]: { opcode: 0x8, format: InstructionFormat.TWO },
  [Mnemonic.OR]: { opcode: 0x9, format: InstructionFormat.TWO },
  [Mnemonic.NOT]: { opcode: 0xa, format: InstructionFormat.TWO },
  [Mnemonic.CMP]: { opcode: 0xb, format: InstructionFormat.TWO },
  [Mnemonic.CALL]: { opcode: 0xc, format: InstructionFormat.ONE },
  [Mnemonic.JNZ]: { opcode: 0xd, format: InstructionFormat.ONE },
  [Mnemonic.RET]: { opcode: 0xe, format: InstructionFormat.NONE },
  [Mnemonic.HLT]: { opcode: 0xf, format: InstructionFormat.NONE },
};

// Operand field markers
const FIELD_IMMEDIATE = 0xe;
const FIELD_ADDRESS = 0xf;

// io port selectors, added to the opcode word
const PORT_IN = 0x1;
const PORT_OUT = 0x2;

export interface TrailingWord {
  operand: Operand;
  /** Signed words hold immediates and label values, unsigned ones addresses */
  signed: boolean;
}

export interface EncodedInstruction {
  mnemonic: Mnemonic;
  opcode: number;
  trailing: TrailingWord[];
}

function isMnemonic(name: string): name is Mnemonic {
  return Object.values(Mnemonic).some(m => m === name);
}

export function parseMnemonic(name: string, line: number): Mnemonic {
  if (!isMnemonic(name)) {
    throw new AssemblyError(AssemblyErrorKind.UNRECOGNIZED_MNEMONIC, `Unrecognized mnemonic "${name}"`, line);
  }
  return name;
}

function invalidOperand(operand: Operand, line: number): AssemblyError {
  return new AssemblyError(AssemblyErrorKind.INVALID_OPERAND, `Invalid operand "${operand.text}"`, line);
}

function verifyOperands(valid: boolean, mnemonic: Mnemonic, line: number): void {
  if (!valid) {
    throw new AssemblyError(
      AssemblyErrorKind.INVALID_OPERANDS,
      `Invalid operands for mnemonic "${mnemonic}"`,
      line
    );
  }
}

/** Bits 11..8 */
export function encodeOperand1(operand: Operand | undefined): number {
  if (!operand) {
    return 0;
  }
  switch (operand.kind) {
    case OperandKind.IMMEDIATE:
      return FIELD_IMMEDIATE << 8;
    case OperandKind.MEMORY:
    case OperandKind.LABEL:
      return FIELD_ADDRESS << 8;
    case OperandKind.REGISTER:
      return operand.index << 8;
  }
}

/** Bits 7..0 */
export function encodeOperand2(operand: Operand | undefined, line: number): number {
  if (!operand) {
    return 0;
  }
  switch (operand.kind) {
    case OperandKind.REGISTER:
      return operand.index;
    case OperandKind.MEMORY:
    case OperandKind.LABEL:
      return FIELD_ADDRESS << 4;
    case OperandKind.IMMEDIATE:
      throw invalidOperand(operand, line);
  }
}

function planTrailingWords(op1: Operand | undefined, op2: Operand | undefined): TrailingWord[] {
  const trailing: TrailingWord[] = [];

  if (op1 && (op1.kind === OperandKind.IMMEDIATE || op1.kind === OperandKind.LABEL)) {
    trailing.push({ operand: op1, signed: true });
  }
  if (op1?.kind === OperandKind.MEMORY) {
    trailing.push({ operand: op1, signed: false });
  }
  if (op2?.kind === OperandKind.MEMORY) {
    trailing.push({ operand: op2, signed: false });
  }

  return trailing;
}

function encodePort(statement: InstructionStatement, mnemonic: Mnemonic): EncodedInstruction {
  const { op1, op2, line } = statement;
  verifyOperands(op1 !== undefined && op2 !== undefined, mnemonic, line);

  const port = op2?.kind === OperandKind.LABEL ? op2.text : '';
  if (op1?.kind === OperandKind.IMMEDIATE && port === 'in') {
    throw new AssemblyError(AssemblyErrorKind.IMMEDIATE_INPUT, 'Cannot read word into an immediate.', line);
  }

  let opcode = (INSTRUCTIONS[mnemonic].opcode << 12) | encodeOperand1(op1);
  if (port === 'in') {
    opcode += PORT_IN;
  } else if (port === 'out') {
    opcode += PORT_OUT;
  } else {
    throw new AssemblyError(
      AssemblyErrorKind.INVALID_PORT,
      `Error parsing io port. ${op2?.text ?? ''} is not a valid port, use IN or OUT.`,
      line
    );
  }

  return { mnemonic, opcode, trailing: planTrailingWords(op1, undefined) };
}

/**
 * Encode one instruction statement. Trailing words are returned as a plan
 * so their count is known before any label can be resolved.
 */
export function encodeInstruction(statement: InstructionStatement): EncodedInstruction {
  const { op1, op2, line } = statement;
  const mnemonic = parseMnemonic(statement.mnemonic, line);
  const info = INSTRUCTIONS[mnemonic];
  const base = info.opcode << 12;

  switch (info.format) {
    case InstructionFormat.NONE:
      verifyOperands(op1 === undefined && op2 === undefined, mnemonic, line);
      return { mnemonic, opcode: base, trailing: [] };

    case InstructionFormat.ONE:
      verifyOperands(op1 !== undefined && op2 === undefined, mnemonic, line);
      if (info.destination && op1?.kind === OperandKind.IMMEDIATE) {
        throw invalidOperand(op1, line);
      }
      return { mnemonic, opcode: base | encodeOperand1(op1), trailing: planTrailingWords(op1, undefined) };

    case InstructionFormat.TWO:
      verifyOperands(op1 !== undefined && op2 !== undefined, mnemonic, line);
      return {
        mnemonic,
        opcode: base | encodeOperand1(op1) | encodeOperand2(op2, line),
        trailing: planTrailingWords(op1, op2),
      };

    case InstructionFormat.PORT:
      return encodePort(statement, mnemonic);
  }
}

/** Number of 16-bit words the instruction occupies */
export function instructionSize(encoded: EncodedInstruction): number {
  return 1 + encoded.trailing.length;
}

/** Convert a 16-bit word to little-endian bytes */
export function toBytes(word: number): number[] {
  return [word & 0xff, (word >> 8) & 0xff];
}
