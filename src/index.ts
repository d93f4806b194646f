// LLAMA-16 - two-pass assembler for the LLAMA-16 CPU

export * from './assembler/index.js';
