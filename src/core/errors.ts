import type { Word } from '@core/cpu/types';

const hex = (v: number, width = 4): string => v.toString(16).toUpperCase().padStart(width, '0');

// Unknown opcode. Recoverable: the driver decides whether to halt or skip.
export class DecodeError extends Error {
  readonly word: Word;
  readonly pc: Word | undefined;

  constructor(word: Word, pc?: Word) {
    super(`unknown instruction 0x${hex(word)}${pc !== undefined ? ` at 0x${hex(pc, 3)}` : ''}`);
    this.name = 'DecodeError';
    this.word = word;
    this.pc = pc;
  }
}

export class StackUnderflowError extends Error {
  readonly pc: Word;

  constructor(pc: Word) {
    super(`return with empty call stack at 0x${hex(pc, 3)}`);
    this.name = 'StackUnderflowError';
    this.pc = pc;
  }
}

export class StackOverflowError extends Error {
  readonly pc: Word;
  readonly depth: number;

  constructor(pc: Word, depth: number) {
    super(`call stack overflow (depth ${depth}) at 0x${hex(pc, 3)}`);
    this.name = 'StackOverflowError';
    this.pc = pc;
    this.depth = depth;
  }
}

export class MemoryAccessError extends Error {
  readonly address: number;
  readonly length: number;

  constructor(address: number, length: number) {
    super(`memory access out of range: ${length} byte(s) at 0x${hex(address)}`);
    this.name = 'MemoryAccessError';
    this.address = address;
    this.length = length;
  }
}

export class RomTooLargeError extends Error {
  readonly size: number;
  readonly capacity: number;

  constructor(size: number, capacity: number) {
    super(`ROM is ${size} bytes, only ${capacity} fit above 0x200`);
    this.name = 'RomTooLargeError';
    this.size = size;
    this.capacity = capacity;
  }
}

// Errors after which the machine state can no longer be trusted
export type FatalError = StackUnderflowError | StackOverflowError | MemoryAccessError;

export function isFatal(e: unknown): e is FatalError {
  return e instanceof StackUnderflowError || e instanceof StackOverflowError || e instanceof MemoryAccessError;
}
