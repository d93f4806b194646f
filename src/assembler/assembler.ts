/**
 * LLAMA-16 Assembler
 *
 * Two-pass assembler. Pass 1 walks the source to assign every label an
 * address; pass 2 walks it again, resolving operands and emitting bytes.
 * Both passes advance the location counter by exactly the same amounts.
 */

import { AssemblyError, AssemblyErrorKind } from './errors.js';
import { encodeData, encodeString, DirectiveKind } from './directives.js';
import { encodeInstruction, instructionSize, toBytes, type TrailingWord } from './encoder.js';
import { OperandKind, parseDecimal, parseHexAddress } from './operands.js';
import { SymbolTable } from './symbols.js';
import {
  StatementType,
  tokenizeLine,
  type DirectiveStatement,
  type InstructionStatement,
  type Statement,
} from './tokenizer.js';

/** Load address of the image; symbol addresses are relative to it */
export const ORIGIN = 0x4000;

/** Highest addressable word */
export const ADDRESS_MAX = 0xffff;

export enum Pass {
  SYMBOLS = 1,
  EMIT = 2,
}

export interface AssemblerOptions {
  /** Trace every tokenized line and pass summary to the console */
  debug?: boolean;
}

export interface AssemblerResult {
  bytes: Uint8Array;
  symbols: SymbolTable;
  /** Final location counter, in words */
  size: number;
}

export class Assembler {
  private source: string;
  private debug: boolean;
  private symbols: SymbolTable = new SymbolTable();
  private output: number[] = [];
  private address: number = 0;
  private pass: Pass = Pass.SYMBOLS;
  private lineNumber: number = 0;

  constructor(source: string, options: AssemblerOptions = {}) {
    this.source = source;
    this.debug = options.debug ?? false;
  }

  /** Location counter, in words from ORIGIN */
  get currentAddress(): number {
    return this.address;
  }

  get currentLine(): number {
    return this.lineNumber;
  }

  get symbolTable(): SymbolTable {
    return this.symbols;
  }

  assemble(): AssemblerResult {
    this.symbols = new SymbolTable();
    this.output = [];

    const lines = this.source.split(/\r?\n/);

    this.runPass(Pass.SYMBOLS, lines);
    const pass1Size = this.address;

    this.runPass(Pass.EMIT, lines);
    if (this.address !== pass1Size) {
      throw new Error(`Location counter mismatch: pass 1 ended at ${pass1Size}, pass 2 at ${this.address}`);
    }

    return {
      bytes: new Uint8Array(this.output),
      symbols: this.symbols,
      size: this.address,
    };
  }

  private runPass(pass: Pass, lines: string[]): void {
    this.pass = pass;
    this.address = 0;
    this.lineNumber = 0;

    for (const text of lines) {
      this.lineNumber++;
      const statement = tokenizeLine(text, this.lineNumber);
      if (this.debug) {
        console.log(describeStatement(statement));
      }
      this.process(statement);
    }

    if (this.debug) {
      console.log(`Parsed ${this.lineNumber} lines on pass ${pass}`);
    }
  }

  private process(statement: Statement): void {
    switch (statement.type) {
      case StatementType.DIRECTIVE:
        this.processDirective(statement);
        break;
      case StatementType.INSTRUCTION:
        this.processInstruction(statement);
        break;
    }
  }

  private processDirective(statement: DirectiveStatement): void {
    const { line } = statement;
    if (statement.label === undefined) {
      throw new AssemblyError(
        AssemblyErrorKind.MISSING_DIRECTIVE_LABEL,
        '.data and .string directives must be labeled',
        line
      );
    }
    if (statement.argument === '') {
      throw new AssemblyError(
        AssemblyErrorKind.INVALID_OPERANDS,
        `Invalid operands for mnemonic "${statement.directive}"`,
        line
      );
    }

    const bytes = statement.directive === DirectiveKind.DATA
      ? encodeData(statement.argument, line)
      : encodeString(statement.argument);

    this.place(statement.label, bytes.length / 2, line, () => Array.from(bytes));
  }

  private processInstruction(statement: InstructionStatement): void {
    const { line, label } = statement;

    if (statement.mnemonic === '') {
      if (statement.op1 || statement.op2) {
        throw new AssemblyError(AssemblyErrorKind.UNRECOGNIZED_MNEMONIC, 'Unrecognized mnemonic ""', line);
      }
      // A label on a line of its own names the next statement
      if (label !== undefined && this.pass === Pass.SYMBOLS) {
        this.checkCounter(0, line);
        this.symbols.define(label, ORIGIN + this.address, line);
      }
      return;
    }

    const encoded = encodeInstruction(statement);
    this.place(label, instructionSize(encoded), line, () => {
      const bytes = toBytes(encoded.opcode);
      for (const word of encoded.trailing) {
        bytes.push(...toBytes(this.resolveTrailingWord(word, line)));
      }
      return bytes;
    });
  }

  /**
   * Pass 1 records the label, pass 2 appends the bytes; both advance the
   * location counter by `words`.
   */
  private place(label: string | undefined, words: number, line: number, emit: () => number[]): void {
    this.checkCounter(words, line);
    if (this.pass === Pass.SYMBOLS) {
      if (label !== undefined) {
        this.symbols.define(label, ORIGIN + this.address, line);
      }
    } else {
      this.output.push(...emit());
    }
    this.address += words;
  }

  /** The statement at the counter, `words` long, must end by ADDRESS_MAX */
  private checkCounter(words: number, line: number): void {
    const end = ORIGIN + this.address + Math.max(words - 1, 0);
    if (end > ADDRESS_MAX) {
      throw new AssemblyError(
        AssemblyErrorKind.VALUE_OUT_OF_RANGE,
        `Location counter passed 0x${ADDRESS_MAX.toString(16)}`,
        line
      );
    }
  }

  private resolveTrailingWord(word: TrailingWord, line: number): number {
    const { operand } = word;

    if (operand.kind === OperandKind.MEMORY) {
      const literal = parseHexAddress(operand.text);
      const address = literal ?? this.symbols.resolve(operand.text, line);
      return checkRange(address, 0, ADDRESS_MAX, line);
    }

    const literal = parseDecimal(operand.text);
    if (literal === undefined) {
      return this.symbols.resolve(operand.text, line);
    }
    return word.signed
      ? checkRange(literal, -0x8000, 0x7fff, line) & 0xffff
      : checkRange(literal, 0, 0xffff, line);
  }
}

function checkRange(value: number, min: number, max: number, line: number): number {
  if (value < min || value > max) {
    throw new AssemblyError(
      AssemblyErrorKind.VALUE_OUT_OF_RANGE,
      `Value ${value} is outside ${min}..${max}`,
      line
    );
  }
  return value;
}

export function describeStatement(statement: Statement): string {
  if (statement.type === StatementType.DIRECTIVE) {
    return [
      `Label: ${statement.label ?? ''}`,
      `Directive: ${statement.directive}`,
      `Argument: ${statement.argument}`,
      `Comment: ${statement.comment ?? ''}`,
      '',
    ].join('\n');
  }
  return [
    `Label: ${statement.label ?? ''}`,
    `Mnemonic: ${statement.mnemonic}`,
    `Op1: ${statement.op1?.text ?? ''}`,
    `Op1 Type: ${statement.op1?.kind ?? ''}`,
    `Op2: ${statement.op2?.text ?? ''}`,
    `Op2 Type: ${statement.op2?.kind ?? ''}`,
    `Comment: ${statement.comment ?? ''}`,
    '',
  ].join('\n');
}

/** Assemble source text in one call */
export function assemble(source: string, options: AssemblerOptions = {}): AssemblerResult {
  return new Assembler(source, options).assemble();
}
