import { describe, it, expect } from 'vitest';
import { formatInstruction, formatWord, formatTraceLine } from '@utils/disasm';
import { decode } from '@core/cpu/instructions';

describe('disassembly formatting', () => {
  it('formats operands in conventional mnemonics', () => {
    expect(formatInstruction(decode(0x6A05))).toBe('LD VA, #$05');
    expect(formatInstruction(decode(0x1ABC))).toBe('JP $ABC');
    expect(formatInstruction(decode(0xB2F0))).toBe('JP V0, $2F0');
    expect(formatInstruction(decode(0xD12F))).toBe('DRW V1, V2, 15');
    expect(formatInstruction(decode(0x834E))).toBe('SHL V3, V4');
    expect(formatInstruction(decode(0xF355))).toBe('LD [I], V3');
    expect(formatInstruction(decode(0xF365))).toBe('LD V3, [I]');
    expect(formatInstruction(decode(0xF00A))).toBe('LD V0, K');
  });

  it('marks words that do not decode', () => {
    expect(formatWord(0xC0FF)).toBe('???');
    expect(formatWord(0x00E0)).toBe('CLS');
  });

  it('aligns register columns in trace lines', () => {
    const line = formatTraceLine(0x200, 0x6A05, { v: new Uint8Array(16), i: 0, sp: 0, dt: 0 });
    const regs = 'V:' + Array(16).fill('00').join(' ') + ' I:000 SP:0 DT:00';
    expect(line).toBe('200  6A05  LD VA, #$05' + ' '.repeat(6) + regs);
    expect(line.indexOf('V:')).toBe(28);
  });
});
