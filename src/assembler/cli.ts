#!/usr/bin/env node
/**
 * LLAMA-16 Assembler CLI
 *
 * Usage: llama16-asm <input.asm> [-o OUTFILE] [-s] [-d] [--hex]
 */

import { existsSync, readFileSync, realpathSync } from 'fs';
import { format, parse } from 'path';
import { pathToFileURL } from 'url';
import { Assembler, ORIGIN, type AssemblerResult } from './assembler.js';
import { AssemblyError } from './errors.js';
import { formatHexDump, writeBinaryFile, writeSymbolFile } from './output.js';

export interface CliOptions {
  inputFile: string;
  outputFile: string;
  symbolFile?: string;
  debug: boolean;
  hexDump: boolean;
}

/** Replace the extension of `path`, or add one */
export function withExtension(path: string, extension: string): string {
  const parsed = parse(path);
  return format({ dir: parsed.dir, name: parsed.name, ext: extension });
}

export function parseArgs(args: string[]): CliOptions | null {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return null;
  }

  let inputFile = '';
  let outputFile = '';
  let symbols = false;
  let debug = false;
  let hexDump = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-o' || arg === '--outfile') {
      if (i + 1 >= cliArgs.length) {
        console.error('Error: -o requires an output filename');
        return null;
      }
      outputFile = cliArgs[++i];
    } else if (arg === '-s' || arg === '--symtab') {
      symbols = true;
    } else if (arg === '-d' || arg === '--debug') {
      debug = true;
    } else if (arg === '--hex') {
      hexDump = true;
    } else if (arg === '-h' || arg === '--help') {
      return null;
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return null;
    }
  }

  if (!inputFile) {
    console.error('Error: No input file specified');
    return null;
  }

  if (!outputFile) {
    outputFile = withExtension(inputFile, '.OUT');
  }

  return {
    inputFile,
    outputFile,
    symbolFile: symbols ? withExtension(outputFile, '.SYM') : undefined,
    debug,
    hexDump,
  };
}

function printUsage(): void {
  console.log(`LLAMA-16 Assembler

Usage: llama16-asm <input.asm> [-o OUTFILE] [-s] [-d] [--hex]

Options:
  -o, --outfile <file>  Output file (default: <input>.OUT)
  -s, --symtab          Save the symbol table to <output>.SYM
  -d, --debug           Print extra debugging information
  --hex                 Print hex dump of output
  -h, --help            Show this help message

Examples:
  llama16-asm program.asm
  llama16-asm program.asm -o rom.OUT -s`);
}

function reportError(error: AssemblyError, assembler: Assembler, debug: boolean): void {
  console.error(`Assembly error on line ${error.line}: ${error.message}`);
  if (debug) {
    console.log(`DEBUG: Current address: ${assembler.currentAddress}`);
    console.log(`DEBUG: Current symbol table: ${assembler.symbolTable.toString()}`);
  }
}

export function main(args: string[] = process.argv): number {
  const startTime = performance.now();
  const options = parseArgs(args);

  if (!options) {
    printUsage();
    return args.some(a => a === '-h' || a === '--help') ? 0 : 1;
  }

  // Read input file
  let source: string;
  try {
    source = readFileSync(options.inputFile, 'utf-8');
  } catch (e) {
    const err = e as NodeJS.ErrnoException;
    if (err.code === 'ENOENT') {
      console.error(`Error: File not found: ${options.inputFile}`);
    } else {
      console.error(`Error: Cannot read file: ${options.inputFile}`);
    }
    return 1;
  }

  // Assemble
  const assembler = new Assembler(source, { debug: options.debug });
  let result: AssemblerResult;
  try {
    result = assembler.assemble();
  } catch (e) {
    if (e instanceof AssemblyError) {
      reportError(e, assembler, options.debug);
      return 1;
    }
    throw e;
  }

  // Write output
  let bytesWritten: number;
  let symbolCount = 0;
  try {
    bytesWritten = writeBinaryFile(options.outputFile, result.bytes);
    if (options.symbolFile) {
      symbolCount = writeSymbolFile(options.symbolFile, result.symbols);
    }
  } catch (e) {
    console.error(`Error: Cannot write file: ${options.outputFile}`);
    return 1;
  }

  console.log(`Assembled ${bytesWritten} bytes to ${options.outputFile}`);

  if (options.debug) {
    if (options.symbolFile) {
      console.log(`Writing ${symbolCount} symbols to ${options.symbolFile}`);
    }
    console.log(`--- Finished in ${((performance.now() - startTime) / 1000).toFixed(4)} seconds ---`);
  }

  // Print hex dump if requested
  if (options.hexDump) {
    console.log('\nHex dump:');
    console.log(formatHexDump(result.bytes, ORIGIN));
  }

  return 0;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry || !existsSync(entry)) {
    return false;
  }
  return import.meta.url === pathToFileURL(realpathSync(entry)).href;
}

// Run if executed directly
if (isEntryPoint()) {
  process.exit(main());
}
