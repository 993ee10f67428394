import type { Byte, Word } from './types';
import { DecodeError } from '@core/errors';

type Reg = { x: number };
type RegPair = { x: number; y: number };
type RegImm = { x: number; value: Byte };
type Addr = { address: Word };

// One variant per opcode. x/y are register indices, address is 12-bit, value is 8-bit.
export type Instruction =
  | { kind: 'Clear' } // 00E0
  | { kind: 'Return' } // 00EE
  | ({ kind: 'Jump' } & Addr) // 1nnn
  | ({ kind: 'Call' } & Addr) // 2nnn
  | ({ kind: 'SkipEq' } & RegImm) // 3xkk
  | ({ kind: 'SkipNeq' } & RegImm) // 4xkk
  | ({ kind: 'SkipEqReg' } & RegPair) // 5xy0
  | ({ kind: 'LoadImm' } & RegImm) // 6xkk
  | ({ kind: 'AddImm' } & RegImm) // 7xkk
  | ({ kind: 'Copy' } & RegPair) // 8xy0
  | ({ kind: 'Or' } & RegPair) // 8xy1
  | ({ kind: 'And' } & RegPair) // 8xy2
  | ({ kind: 'Xor' } & RegPair) // 8xy3
  | ({ kind: 'AddReg' } & RegPair) // 8xy4
  | ({ kind: 'SubReg' } & RegPair) // 8xy5: Vx = Vx - Vy
  | ({ kind: 'ShiftRight' } & RegPair) // 8xy6
  | ({ kind: 'SubRegReverse' } & RegPair) // 8xy7: Vx = Vy - Vx
  | ({ kind: 'ShiftLeft' } & RegPair) // 8xyE
  | ({ kind: 'SkipNeqReg' } & RegPair) // 9xy0
  | ({ kind: 'LoadI' } & Addr) // Annn
  | ({ kind: 'JumpV0Offset' } & Addr) // Bnnn
  | ({ kind: 'DrawSprite' } & RegPair & { n: number }) // Dxyn
  | ({ kind: 'SkipIfKeyDown' } & Reg) // Ex9E
  | ({ kind: 'SkipIfKeyUp' } & Reg) // ExA1
  | ({ kind: 'ReadDelayTimer' } & Reg) // Fx07
  | ({ kind: 'WaitForKey' } & Reg) // Fx0A
  | ({ kind: 'SetDelayTimer' } & Reg) // Fx15
  | ({ kind: 'AddXToI' } & Reg) // Fx1E
  | ({ kind: 'LoadFontChar' } & Reg) // Fx29
  | ({ kind: 'StoreBCD' } & Reg) // Fx33
  | ({ kind: 'StoreRegisters' } & Reg) // Fx55
  | ({ kind: 'LoadRegisters' } & Reg); // Fx65

const address = (word: Word): Word => word & 0x0FFF;
const byte = (word: Word): Byte => word & 0x00FF;

/**
 * Decode a 16-bit instruction word. Pure; throws {@link DecodeError} carrying the
 * raw word for patterns outside the opcode table.
 */
export function decode(word: Word, pc?: Word): Instruction {
  word &= 0xFFFF;
  const a = (word >>> 12) & 0xF;
  const x = (word >>> 8) & 0xF;
  const y = (word >>> 4) & 0xF;
  const d = word & 0xF;

  switch (a) {
    case 0x0:
      if (word === 0x00E0) return { kind: 'Clear' };
      if (word === 0x00EE) return { kind: 'Return' };
      break;
    case 0x1: return { kind: 'Jump', address: address(word) };
    case 0x2: return { kind: 'Call', address: address(word) };
    case 0x3: return { kind: 'SkipEq', x, value: byte(word) };
    case 0x4: return { kind: 'SkipNeq', x, value: byte(word) };
    case 0x5:
      if (d === 0x0) return { kind: 'SkipEqReg', x, y };
      break;
    case 0x6: return { kind: 'LoadImm', x, value: byte(word) };
    case 0x7: return { kind: 'AddImm', x, value: byte(word) };
    case 0x8:
      switch (d) {
        case 0x0: return { kind: 'Copy', x, y };
        case 0x1: return { kind: 'Or', x, y };
        case 0x2: return { kind: 'And', x, y };
        case 0x3: return { kind: 'Xor', x, y };
        case 0x4: return { kind: 'AddReg', x, y };
        case 0x5: return { kind: 'SubReg', x, y };
        case 0x6: return { kind: 'ShiftRight', x, y };
        case 0x7: return { kind: 'SubRegReverse', x, y };
        case 0xE: return { kind: 'ShiftLeft', x, y };
      }
      break;
    case 0x9:
      if (d === 0x0) return { kind: 'SkipNeqReg', x, y };
      break;
    case 0xA: return { kind: 'LoadI', address: address(word) };
    case 0xB: return { kind: 'JumpV0Offset', address: address(word) };
    case 0xD: return { kind: 'DrawSprite', x, y, n: d };
    case 0xE:
      if (byte(word) === 0x9E) return { kind: 'SkipIfKeyDown', x };
      if (byte(word) === 0xA1) return { kind: 'SkipIfKeyUp', x };
      break;
    case 0xF:
      switch (byte(word)) {
        case 0x07: return { kind: 'ReadDelayTimer', x };
        case 0x0A: return { kind: 'WaitForKey', x };
        case 0x15: return { kind: 'SetDelayTimer', x };
        case 0x1E: return { kind: 'AddXToI', x };
        case 0x29: return { kind: 'LoadFontChar', x };
        case 0x33: return { kind: 'StoreBCD', x };
        case 0x55: return { kind: 'StoreRegisters', x };
        case 0x65: return { kind: 'LoadRegisters', x };
      }
      break;
  }
  throw new DecodeError(word, pc);
}

// Non-throwing variant for trace tooling
export function tryDecode(word: Word): Instruction | undefined {
  try {
    return decode(word);
  } catch (e) {
    if (e instanceof DecodeError) return undefined;
    throw e;
  }
}
