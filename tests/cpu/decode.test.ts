import { describe, it, expect } from 'vitest';
import { decode, tryDecode, type Instruction } from '@core/cpu/instructions';
import { DecodeError } from '@core/errors';

describe('instruction decoder', () => {
  const table: Array<[number, Instruction]> = [
    [0x00E0, { kind: 'Clear' }],
    [0x00EE, { kind: 'Return' }],
    [0x1ABC, { kind: 'Jump', address: 0xABC }],
    [0x2204, { kind: 'Call', address: 0x204 }],
    [0x3A42, { kind: 'SkipEq', x: 0xA, value: 0x42 }],
    [0x4B07, { kind: 'SkipNeq', x: 0xB, value: 0x07 }],
    [0x5120, { kind: 'SkipEqReg', x: 1, y: 2 }],
    [0x6A05, { kind: 'LoadImm', x: 0xA, value: 0x05 }],
    [0x7CFF, { kind: 'AddImm', x: 0xC, value: 0xFF }],
    [0x8340, { kind: 'Copy', x: 3, y: 4 }],
    [0x8341, { kind: 'Or', x: 3, y: 4 }],
    [0x8342, { kind: 'And', x: 3, y: 4 }],
    [0x8343, { kind: 'Xor', x: 3, y: 4 }],
    [0x8344, { kind: 'AddReg', x: 3, y: 4 }],
    [0x8345, { kind: 'SubReg', x: 3, y: 4 }],
    [0x8346, { kind: 'ShiftRight', x: 3, y: 4 }],
    [0x8347, { kind: 'SubRegReverse', x: 3, y: 4 }],
    [0x834E, { kind: 'ShiftLeft', x: 3, y: 4 }],
    [0x9560, { kind: 'SkipNeqReg', x: 5, y: 6 }],
    [0xA123, { kind: 'LoadI', address: 0x123 }],
    [0xB300, { kind: 'JumpV0Offset', address: 0x300 }],
    [0xD12F, { kind: 'DrawSprite', x: 1, y: 2, n: 0xF }],
    [0xE19E, { kind: 'SkipIfKeyDown', x: 1 }],
    [0xE2A1, { kind: 'SkipIfKeyUp', x: 2 }],
    [0xF307, { kind: 'ReadDelayTimer', x: 3 }],
    [0xF40A, { kind: 'WaitForKey', x: 4 }],
    [0xF515, { kind: 'SetDelayTimer', x: 5 }],
    [0xF61E, { kind: 'AddXToI', x: 6 }],
    [0xF729, { kind: 'LoadFontChar', x: 7 }],
    [0xF833, { kind: 'StoreBCD', x: 8 }],
    [0xF955, { kind: 'StoreRegisters', x: 9 }],
    [0xFA65, { kind: 'LoadRegisters', x: 0xA }],
  ];

  for (const [word, expected] of table) {
    it(`decodes ${word.toString(16).toUpperCase().padStart(4, '0')} as ${expected.kind}`, () => {
      expect(decode(word)).toEqual(expected);
    });
  }

  it('rejects patterns outside the table and keeps the raw word', () => {
    for (const word of [0x0000, 0x0123, 0x00E1, 0x5121, 0x8128, 0x912F, 0xC0FF, 0xE19F, 0xF1FF, 0xF018]) {
      let caught: unknown;
      try { decode(word); } catch (e) { caught = e; }
      expect(caught).toBeInstanceOf(DecodeError);
      if (caught instanceof DecodeError) expect(caught.word).toBe(word);
    }
  });

  it('includes the fetch address in the error message when given', () => {
    expect(() => decode(0xFFFF, 0x2A0)).toThrow('unknown instruction 0xFFFF at 0x2A0');
  });

  it('tryDecode returns undefined for unknown words', () => {
    expect(tryDecode(0xC012)).toBeUndefined();
    expect(tryDecode(0x00E0)).toEqual({ kind: 'Clear' });
  });
});
