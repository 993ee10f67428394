import type { Byte, Word } from '@core/cpu/types';
import { tryDecode, type Instruction } from '@core/cpu/instructions';

function hex(v: number, width: number) { return v.toString(16).toUpperCase().padStart(width, '0'); }
const reg = (r: number) => 'V' + hex(r, 1);
const addr = (a: Word) => '$' + hex(a, 3);
const imm = (b: Byte) => '#$' + hex(b, 2);

// Conventional CHIP-8 assembly mnemonics for a decoded instruction
export function formatInstruction(ins: Instruction): string {
  switch (ins.kind) {
    case 'Clear': return 'CLS';
    case 'Return': return 'RET';
    case 'Jump': return `JP ${addr(ins.address)}`;
    case 'Call': return `CALL ${addr(ins.address)}`;
    case 'SkipEq': return `SE ${reg(ins.x)}, ${imm(ins.value)}`;
    case 'SkipNeq': return `SNE ${reg(ins.x)}, ${imm(ins.value)}`;
    case 'SkipEqReg': return `SE ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'SkipNeqReg': return `SNE ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'LoadImm': return `LD ${reg(ins.x)}, ${imm(ins.value)}`;
    case 'AddImm': return `ADD ${reg(ins.x)}, ${imm(ins.value)}`;
    case 'Copy': return `LD ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'Or': return `OR ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'And': return `AND ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'Xor': return `XOR ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'AddReg': return `ADD ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'SubReg': return `SUB ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'SubRegReverse': return `SUBN ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'ShiftRight': return `SHR ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'ShiftLeft': return `SHL ${reg(ins.x)}, ${reg(ins.y)}`;
    case 'LoadI': return `LD I, ${addr(ins.address)}`;
    case 'JumpV0Offset': return `JP V0, ${addr(ins.address)}`;
    case 'DrawSprite': return `DRW ${reg(ins.x)}, ${reg(ins.y)}, ${ins.n}`;
    case 'SkipIfKeyDown': return `SKP ${reg(ins.x)}`;
    case 'SkipIfKeyUp': return `SKNP ${reg(ins.x)}`;
    case 'ReadDelayTimer': return `LD ${reg(ins.x)}, DT`;
    case 'WaitForKey': return `LD ${reg(ins.x)}, K`;
    case 'SetDelayTimer': return `LD DT, ${reg(ins.x)}`;
    case 'AddXToI': return `ADD I, ${reg(ins.x)}`;
    case 'LoadFontChar': return `LD F, ${reg(ins.x)}`;
    case 'StoreBCD': return `LD B, ${reg(ins.x)}`;
    case 'StoreRegisters': return `LD [I], ${reg(ins.x)}`;
    case 'LoadRegisters': return `LD ${reg(ins.x)}, [I]`;
  }
}

// Mnemonic for a raw word, "???" when it does not decode
export function formatWord(word: Word): string {
  const ins = tryDecode(word);
  return ins ? formatInstruction(ins) : '???';
}

export interface TraceRegs {
  v: ArrayLike<number>;
  i: Word;
  sp: number;
  dt: Byte;
}

// "PPP  OOOO  MNEMONIC...             V:00 .. 00 I:III SP:N DT:NN", register columns start at 28
export function formatTraceLine(pc: Word, opcode: Word, regs: TraceRegs): string {
  const left = `${hex(pc, 3)}  ${hex(opcode, 4)}  ${formatWord(opcode)}`;
  const regCol = 28;
  const pad = left.length < regCol ? ' '.repeat(regCol - left.length) : ' ';
  const v = Array.from(regs.v, (b) => hex(b, 2)).join(' ');
  return `${left}${pad}V:${v} I:${hex(regs.i, 3)} SP:${regs.sp} DT:${hex(regs.dt, 2)}`;
}
