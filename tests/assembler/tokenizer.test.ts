import { describe, it, expect } from 'vitest';
import {
  tokenizeLine,
  tokenize,
  StatementType,
  type InstructionStatement,
  type Statement,
} from '../../src/assembler/tokenizer.js';
import { DirectiveKind } from '../../src/assembler/directives.js';
import { OperandKind } from '../../src/assembler/operands.js';
import { AssemblyError, AssemblyErrorKind } from '../../src/assembler/errors.js';

function instruction(statement: Statement): InstructionStatement {
  if (statement.type !== StatementType.INSTRUCTION) {
    throw new Error(`expected an instruction, got ${statement.type}`);
  }
  return statement;
}

describe('Tokenizer', () => {
  describe('blank lines and comments', () => {
    it('should produce an empty statement for a blank line', () => {
      const stmt = instruction(tokenizeLine('', 1));
      expect(stmt.mnemonic).toBe('');
      expect(stmt.label).toBeUndefined();
      expect(stmt.op1).toBeUndefined();
      expect(stmt.op2).toBeUndefined();
    });

    it('should split off a comment-only line', () => {
      const stmt = instruction(tokenizeLine('   ; just a note', 1));
      expect(stmt.mnemonic).toBe('');
      expect(stmt.comment).toBe('just a note');
    });

    it('should split at the last semicolon', () => {
      const stmt = instruction(tokenizeLine('hlt ; stop; really', 1));
      expect(stmt.comment).toBe('really');
    });

    it('should not treat a quoted semicolon as a comment', () => {
      const stmt = tokenizeLine('msg: .string "a;b" ; text', 1);
      expect(stmt.type).toBe(StatementType.DIRECTIVE);
      if (stmt.type === StatementType.DIRECTIVE) {
        expect(stmt.argument).toBe('"a;b"');
        expect(stmt.comment).toBe('text');
      }
    });

    it('should split the comment after an unclosed apostrophe', () => {
      const stmt = tokenizeLine("msg: .string it's ; greeting", 1);
      expect(stmt.type).toBe(StatementType.DIRECTIVE);
      if (stmt.type === StatementType.DIRECTIVE) {
        expect(stmt.argument).toBe("it's");
        expect(stmt.comment).toBe('greeting');
      }
    });

    it('should split the comment after an unclosed quote on an instruction', () => {
      const stmt = instruction(tokenizeLine('push x" ; note', 1));
      expect(stmt.op1).toEqual({ kind: OperandKind.LABEL, text: 'x"' });
      expect(stmt.comment).toBe('note');
    });

    it('should unescape an escaped semicolon', () => {
      const stmt = tokenizeLine('msg: .string a\\;b', 1);
      expect(stmt.type).toBe(StatementType.DIRECTIVE);
      if (stmt.type === StatementType.DIRECTIVE) {
        expect(stmt.argument).toBe('a;b');
        expect(stmt.comment).toBeUndefined();
      }
    });
  });

  describe('instructions', () => {
    it('should tokenize a mnemonic with no operands', () => {
      const stmt = instruction(tokenizeLine('HLT', 1));
      expect(stmt.mnemonic).toBe('hlt');
      expect(stmt.op1).toBeUndefined();
    });

    it('should tokenize two operands', () => {
      const stmt = instruction(tokenizeLine('  MV A, B', 3));
      expect(stmt.line).toBe(3);
      expect(stmt.mnemonic).toBe('mv');
      expect(stmt.op1).toEqual({ kind: OperandKind.REGISTER, text: 'a', index: 0 });
      expect(stmt.op2).toEqual({ kind: OperandKind.REGISTER, text: 'b', index: 1 });
    });

    it('should accept tabs as separators', () => {
      const stmt = instruction(tokenizeLine('\tadd\t#3,\tc', 1));
      expect(stmt.mnemonic).toBe('add');
      expect(stmt.op1).toEqual({ kind: OperandKind.IMMEDIATE, text: '3' });
      expect(stmt.op2).toEqual({ kind: OperandKind.REGISTER, text: 'c', index: 2 });
    });

    it('should tolerate spaces around the comma', () => {
      const stmt = instruction(tokenizeLine('sub d , a', 1));
      expect(stmt.mnemonic).toBe('sub');
      expect(stmt.op1?.text).toBe('d');
      expect(stmt.op2?.text).toBe('a');
    });

    it('should split a label from the mnemonic', () => {
      const stmt = instruction(tokenizeLine('Loop: jnz loop', 1));
      expect(stmt.label).toBe('loop');
      expect(stmt.mnemonic).toBe('jnz');
      expect(stmt.op1).toEqual({ kind: OperandKind.LABEL, text: 'loop' });
    });

    it('should move the mnemonic out of operand 1 for a labeled bare mnemonic', () => {
      const stmt = instruction(tokenizeLine('done: hlt', 1));
      expect(stmt.label).toBe('done');
      expect(stmt.mnemonic).toBe('hlt');
      expect(stmt.op1).toBeUndefined();
    });

    it('should keep a label on a line of its own', () => {
      const stmt = instruction(tokenizeLine('start:', 1));
      expect(stmt.label).toBe('start');
      expect(stmt.mnemonic).toBe('');
    });

    it('should classify memory operands', () => {
      const stmt = instruction(tokenizeLine('mv [4000], [0x4002]', 1));
      expect(stmt.op1).toEqual({ kind: OperandKind.MEMORY, text: '4000' });
      expect(stmt.op2).toEqual({ kind: OperandKind.MEMORY, text: '0x4002' });
    });

    it('should only accept general registers as operand 1', () => {
      const stmt = instruction(tokenizeLine('push sp', 1));
      expect(stmt.op1).toEqual({ kind: OperandKind.LABEL, text: 'sp' });
    });

    it('should accept every register as operand 2', () => {
      const stmt = instruction(tokenizeLine('mv a, bp', 1));
      expect(stmt.op2).toEqual({ kind: OperandKind.REGISTER, text: 'bp', index: 6 });
    });
  });

  describe('directives', () => {
    it('should short-circuit to a directive statement', () => {
      const stmt = tokenizeLine('count: .data 42 ; initial', 1);
      expect(stmt).toEqual({
        type: StatementType.DIRECTIVE,
        line: 1,
        label: 'count',
        directive: DirectiveKind.DATA,
        argument: '42',
        comment: 'initial',
      });
    });

    it('should reject an invalid directive label', () => {
      expect(() => tokenizeLine('1abc: .data 1', 4)).toThrow(AssemblyError);
      try {
        tokenizeLine('1abc: .data 1', 4);
      } catch (e) {
        expect(e).toBeInstanceOf(AssemblyError);
        if (e instanceof AssemblyError) {
          expect(e.kind).toBe(AssemblyErrorKind.INVALID_LABEL);
          expect(e.line).toBe(4);
        }
      }
    });
  });

  describe('tokenize', () => {
    it('should number lines from 1', () => {
      const statements = tokenize('hlt\r\n\nret');
      expect(statements.map(s => s.line)).toEqual([1, 2, 3]);
      expect(statements.map(s => s.type === StatementType.INSTRUCTION ? s.mnemonic : '')).toEqual([
        'hlt',
        '',
        'ret',
      ]);
    });
  });
});
