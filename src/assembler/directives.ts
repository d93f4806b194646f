/**
 * LLAMA-16 Directive Recognizer
 *
 * `.data` and `.string` have their own grammar: a mandatory `label:`
 * followed by the directive keyword and a single argument.
 */

import { AssemblyError, AssemblyErrorKind } from './errors.js';
import { DECIMAL_LITERAL } from './operands.js';

export enum DirectiveKind {
  DATA = '.data',
  STRING = '.string',
}

export interface RecognizedDirective {
  kind: DirectiveKind;
  label?: string;
  argument: string;
}

// Checked in this order; the first keyword found wins
const DIRECTIVE_KEYWORDS = [DirectiveKind.DATA, DirectiveKind.STRING];

const SIGNED_WORD_MIN = -0x8000;
const SIGNED_WORD_MAX = 0x7fff;

function isValidDirectiveLabel(label: string): boolean {
  return /^[a-z0-9]+$/i.test(label) && !/^\d/.test(label);
}

/**
 * Detect a directive in a comment-free line. Returns undefined when the
 * line holds no directive keyword.
 */
export function recognizeDirective(text: string, line: number): RecognizedDirective | undefined {
  const lowered = text.toLowerCase();

  for (const kind of DIRECTIVE_KEYWORDS) {
    const at = lowered.indexOf(kind);
    if (at === -1) {
      continue;
    }

    const before = text.slice(0, at);
    const argument = text.slice(at + kind.length).trim();
    const colon = before.indexOf(':');

    let label: string | undefined;
    if (colon !== -1) {
      const candidate = before.slice(0, colon).trim();
      if (!isValidDirectiveLabel(candidate)) {
        throw new AssemblyError(AssemblyErrorKind.INVALID_LABEL, `Invalid label "${candidate}"`, line);
      }
      label = candidate.toLowerCase();
    } else if (before.trim() !== '') {
      throw new AssemblyError(AssemblyErrorKind.INVALID_LABEL, `Invalid label "${before.trim()}"`, line);
    }

    return {
      kind,
      label,
      argument: kind === DirectiveKind.DATA ? argument.toLowerCase() : argument,
    };
  }

  return undefined;
}

function toWord(value: number): Uint8Array {
  return new Uint8Array([value & 0xff, (value >> 8) & 0xff]);
}

export function encodeData(argument: string, line: number): Uint8Array {
  if (!DECIMAL_LITERAL.test(argument)) {
    throw new AssemblyError(AssemblyErrorKind.INVALID_DATA, `Error reading "${argument}", not an integer`, line);
  }
  const value = parseInt(argument, 10);
  if (value < SIGNED_WORD_MIN || value > SIGNED_WORD_MAX) {
    throw new AssemblyError(AssemblyErrorKind.VALUE_OUT_OF_RANGE, `Value ${value} does not fit in a signed word`, line);
  }
  return toWord(value);
}

/**
 * Encode a `.string` argument. The NUL padding always leaves an even byte
 * count so the next statement stays word aligned.
 */
export function encodeString(argument: string): Uint8Array {
  let content = argument;
  const quote = content[0];
  if (content.length >= 2 && (quote === '"' || quote === "'") && content.endsWith(quote)) {
    content = content.slice(1, -1);
  }

  const encoded = Buffer.from(content, 'utf-8');
  const padding = encoded.length % 2 === 0 ? 2 : 1;
  const bytes = new Uint8Array(encoded.length + padding);
  bytes.set(encoded);
  return bytes;
}
