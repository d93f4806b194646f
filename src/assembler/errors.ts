/**
 * LLAMA-16 Assembler Errors
 *
 * Every assembly error is fatal: the first one thrown aborts the run.
 */

export enum AssemblyErrorKind {
  INVALID_LABEL = 'INVALID_LABEL',
  MISSING_DIRECTIVE_LABEL = 'MISSING_DIRECTIVE_LABEL',
  UNRECOGNIZED_MNEMONIC = 'UNRECOGNIZED_MNEMONIC',
  INVALID_OPERAND = 'INVALID_OPERAND',
  INVALID_OPERANDS = 'INVALID_OPERANDS',
  INVALID_REGISTER = 'INVALID_REGISTER',
  INVALID_PORT = 'INVALID_PORT',
  IMMEDIATE_INPUT = 'IMMEDIATE_INPUT',
  INVALID_DATA = 'INVALID_DATA',
  VALUE_OUT_OF_RANGE = 'VALUE_OUT_OF_RANGE',
  DUPLICATE_LABEL = 'DUPLICATE_LABEL',
  UNDEFINED_LABEL = 'UNDEFINED_LABEL',
}

export class AssemblyError extends Error {
  constructor(public kind: AssemblyErrorKind, message: string, public line: number) {
    super(message);
    this.name = 'AssemblyError';
  }
}
