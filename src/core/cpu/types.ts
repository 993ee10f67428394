export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface CPUState {
  v: Uint8Array; // V0..VF, VF doubles as the flags register
  i: Word; // address register
  pc: Word; // program counter
  stack: Word[]; // return addresses, top of stack last
}

export type Mode =
  | { kind: 'running' }
  | { kind: 'waitForKey'; register: number }
  | { kind: 'paused' };

// Read-only copy of the machine state for debuggers and renderers
export interface Snapshot {
  registers: number[];
  pc: Word;
  i: Word;
  stack: Word[];
  delayTimer: Byte;
  mode: Mode;
  keys: number; // 16-bit key mask
}
