/**
 * LLAMA-16 Assembler
 *
 * Assembles LLAMA-16 assembly source code into a binary image.
 */

export * from './errors.js';
export * from './operands.js';
export * from './directives.js';
export * from './tokenizer.js';
export * from './symbols.js';
export * from './encoder.js';
export * from './assembler.js';
export * from './output.js';
export { main as runCli } from './cli.js';
