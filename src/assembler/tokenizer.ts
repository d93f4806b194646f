/**
 * LLAMA-16 Tokenizer
 *
 * Splits one source line into label, mnemonic, operands and comment. All
 * splits are taken at the last occurrence of their delimiter, working from
 * the end of the line towards the start:
 *
 *   label: mnemonic op1, op2 ; comment
 */

import { classifyOperand, GENERAL_REGISTERS, REGISTERS, type Operand } from './operands.js';
import { DirectiveKind, recognizeDirective } from './directives.js';

export enum StatementType {
  INSTRUCTION = 'INSTRUCTION',
  DIRECTIVE = 'DIRECTIVE',
}

export interface InstructionStatement {
  readonly type: StatementType.INSTRUCTION;
  readonly line: number;
  readonly label?: string;
  /** Empty for blank, comment-only and label-only lines */
  readonly mnemonic: string;
  readonly op1?: Operand;
  readonly op2?: Operand;
  readonly comment?: string;
}

export interface DirectiveStatement {
  readonly type: StatementType.DIRECTIVE;
  readonly line: number;
  readonly label?: string;
  readonly directive: DirectiveKind;
  readonly argument: string;
  readonly comment?: string;
}

export type Statement = InstructionStatement | DirectiveStatement;

interface Partition {
  left: string;
  right: string;
  found: boolean;
}

function rpartition(text: string, separator: string): Partition {
  const at = text.lastIndexOf(separator);
  if (at === -1) {
    return { left: '', right: text, found: false };
  }
  return { left: text.slice(0, at), right: text.slice(at + separator.length), found: true };
}

/**
 * Locate the comment separator: the last `;` outside quotes that is not
 * escaped with a backslash. A quote that never closes (an apostrophe in a
 * word) quotes nothing, so the last unescaped `;` is used instead.
 */
function findCommentStart(text: string): number {
  let quote: string | null = null;
  let start = -1;
  let lastUnescaped = -1;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (char === '\\') {
      i++;
      continue;
    }
    if (char === ';') {
      lastUnescaped = i;
    }
    if (quote !== null) {
      if (char === quote) quote = null;
    } else if (char === '"' || char === "'") {
      quote = char;
    } else if (char === ';') {
      start = i;
    }
  }

  return quote === null ? start : lastUnescaped;
}

function splitComment(text: string): { body: string; comment?: string } {
  const start = findCommentStart(text);
  if (start === -1) {
    return { body: text.replace(/\\;/g, ';').trimEnd() };
  }
  return {
    body: text.slice(0, start).replace(/\\;/g, ';'),
    comment: text.slice(start + 1).trim(),
  };
}

export function tokenizeLine(source: string, line: number): Statement {
  const text = source.trimStart().replace(/\t/g, ' ');
  const { body, comment } = splitComment(text);

  const directive = recognizeDirective(body, line);
  if (directive) {
    return {
      type: StatementType.DIRECTIVE,
      line,
      label: directive.label,
      directive: directive.kind,
      argument: directive.argument,
      comment,
    };
  }

  // Second operand
  const op2Split = rpartition(body, ',');
  const op2 = op2Split.found ? op2Split.right.trim() : '';
  const beforeOp2 = op2Split.found ? op2Split.left.trim() : op2Split.right.trim();

  // First operand
  const op1Split = rpartition(beforeOp2, ' ');
  let op1 = op1Split.found ? op1Split.right.trim() : '';
  const beforeOp1 = op1Split.found ? op1Split.left.trim() : op1Split.right.trim();

  // Label and mnemonic
  const labelSplit = rpartition(beforeOp1, ':');
  let mnemonic = labelSplit.right.trim();
  const label = labelSplit.found ? labelSplit.left.trim() : '';

  // `loop: hlt` leaves the mnemonic where operand 1 would be
  if (mnemonic === '' && op1 !== '' && op2 === '') {
    mnemonic = op1;
    op1 = '';
  }

  return {
    type: StatementType.INSTRUCTION,
    line,
    label: label === '' ? undefined : label.toLowerCase(),
    mnemonic: mnemonic.toLowerCase(),
    op1: classifyOperand(op1, GENERAL_REGISTERS, line),
    op2: classifyOperand(op2, REGISTERS, line),
    comment,
  };
}

/**
 * Tokenize a whole source text, one statement per line. Line numbers start
 * at 1.
 */
export function tokenize(source: string): Statement[] {
  return source.split(/\r?\n/).map((text, index) => tokenizeLine(text, index + 1));
}
