import type { Word, CPUState } from './types';
import { decode, type Instruction } from './instructions';
import type { StepRecord } from './history';
import { Memory, PC_INIT, FONT_BASE, FONT_GLYPH_BYTES } from '@core/bus/memory';
import { Display, DISPLAY_WIDTH, DISPLAY_HEIGHT } from '@core/ppu/display';
import { Keyboard } from '@core/input/keyboard';
import { DelayTimer } from '@core/timer/delay';
import { StackOverflowError, StackUnderflowError } from '@core/errors';
import { resolveOptions, type Chip8Options } from '@core/config';
import { trace, isTraceEnabled } from '@utils/trace';
import { formatInstruction } from '@utils/disasm';
import { renderText } from '@utils/render';

const VF = 0xF;

// Everything an instruction can touch besides the CPU's own registers
export interface Chip8Bus {
  memory: Memory;
  display: Display;
  keyboard: Keyboard;
  timer: DelayTimer;
}

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

export class Chip8CPU {
  readonly state: CPUState;
  private readonly options: Pick<Chip8Options, 'quirks' | 'stackDepth'>;
  // Fx0A does not block here; it asks the owner to switch modes
  private waitForKeyHook: ((register: number) => void) | null = null;

  constructor(private bus: Chip8Bus, options: Pick<Chip8Options, 'quirks' | 'stackDepth'> = resolveOptions()) {
    this.options = options;
    this.state = { v: new Uint8Array(16), i: 0, pc: PC_INIT, stack: [] };
  }

  // Power-on registers, mutated in place so held references stay live
  reset(pc: Word = PC_INIT) {
    const s = this.state;
    s.v.fill(0);
    s.i = 0;
    s.pc = pc;
    s.stack.length = 0;
  }

  setWaitForKeyHook(fn: ((register: number) => void) | null) { this.waitForKeyHook = fn; }

  // Read the word at PC and advance PC by 2. Nothing moves if the read is out of range.
  fetch(): Word {
    const word = this.bus.memory.readWord(this.state.pc);
    this.state.pc = (this.state.pc + 2) & 0xFFFF;
    return word;
  }

  // One fetch-decode-execute cycle
  step(): StepRecord {
    const pc = this.state.pc;
    const opcode = this.fetch();
    const instruction = decode(opcode, pc);
    trace('instr', () => `${hex(pc, 3)}: ${hex(opcode, 4)} ${formatInstruction(instruction)}`);
    this.execute(instruction);
    return { pc, opcode, instruction };
  }

  execute(ins: Instruction): void {
    const s = this.state;
    const v = s.v;
    const { memory, display, keyboard, timer } = this.bus;

    switch (ins.kind) {
      case 'Clear':
        display.clear();
        break;
      case 'Return': {
        const ret = s.stack.pop();
        if (ret === undefined) throw new StackUnderflowError((s.pc - 2) & 0xFFFF);
        s.pc = ret;
        break;
      }
      case 'Jump':
        s.pc = ins.address;
        break;
      case 'Call':
        if (s.stack.length >= this.options.stackDepth) throw new StackOverflowError((s.pc - 2) & 0xFFFF, s.stack.length);
        s.stack.push(s.pc);
        s.pc = ins.address;
        break;
      case 'SkipEq':
        if (v[ins.x] === ins.value) this.skip();
        break;
      case 'SkipNeq':
        if (v[ins.x] !== ins.value) this.skip();
        break;
      case 'SkipEqReg':
        if (v[ins.x] === v[ins.y]) this.skip();
        break;
      case 'SkipNeqReg':
        if (v[ins.x] !== v[ins.y]) this.skip();
        break;
      case 'LoadImm':
        v[ins.x] = ins.value;
        break;
      case 'AddImm':
        v[ins.x] = (v[ins.x] + ins.value) & 0xFF; // VF untouched
        break;
      case 'Copy':
        v[ins.x] = v[ins.y];
        break;
      case 'Or':
        v[ins.x] |= v[ins.y];
        if (this.options.quirks.logicResetsVF) v[VF] = 0;
        break;
      case 'And':
        v[ins.x] &= v[ins.y];
        if (this.options.quirks.logicResetsVF) v[VF] = 0;
        break;
      case 'Xor':
        v[ins.x] ^= v[ins.y];
        if (this.options.quirks.logicResetsVF) v[VF] = 0;
        break;
      case 'AddReg': {
        const sum = v[ins.x] + v[ins.y];
        v[ins.x] = sum & 0xFF;
        v[VF] = sum > 0xFF ? 1 : 0;
        break;
      }
      case 'SubReg': {
        const a = v[ins.x], b = v[ins.y];
        v[ins.x] = (a - b) & 0xFF;
        v[VF] = a >= b ? 1 : 0;
        break;
      }
      case 'SubRegReverse': {
        const a = v[ins.x], b = v[ins.y];
        v[ins.x] = (b - a) & 0xFF;
        v[VF] = b >= a ? 1 : 0;
        break;
      }
      case 'ShiftRight': {
        const value = v[ins.y];
        const out = value & 0x01;
        v[ins.x] = value >>> 1;
        v[VF] = out;
        break;
      }
      case 'ShiftLeft': {
        const value = v[ins.y];
        const out = (value & 0x80) >>> 7;
        v[ins.x] = (value << 1) & 0xFF;
        v[VF] = out;
        break;
      }
      case 'LoadI':
        s.i = ins.address;
        break;
      case 'JumpV0Offset':
        s.pc = ins.address + v[0];
        break;
      case 'DrawSprite':
        this.drawSprite(ins.x, ins.y, ins.n);
        break;
      case 'SkipIfKeyDown': {
        const key = v[ins.x] & 0xF;
        trace('input', () => `SkipIfKeyDown ${hex(key, 1)} ${keyboard.describe()}`);
        if (keyboard.isDown(key)) this.skip();
        break;
      }
      case 'SkipIfKeyUp': {
        const key = v[ins.x] & 0xF;
        trace('input', () => `SkipIfKeyUp ${hex(key, 1)} ${keyboard.describe()}`);
        if (!keyboard.isDown(key)) this.skip();
        break;
      }
      case 'ReadDelayTimer':
        v[ins.x] = timer.value;
        break;
      case 'SetDelayTimer':
        timer.set(v[ins.x]);
        trace('timer', () => `set delay timer to ${timer.value}`);
        break;
      case 'WaitForKey':
        if (this.waitForKeyHook) this.waitForKeyHook(ins.x);
        break;
      case 'AddXToI':
        s.i = (s.i + v[ins.x]) & 0xFFFF;
        break;
      case 'LoadFontChar':
        s.i = FONT_BASE + FONT_GLYPH_BYTES * (v[ins.x] & 0xF);
        break;
      case 'StoreBCD': {
        const value = v[ins.x];
        memory.writeBlock(s.i, [Math.floor(value / 100), Math.floor(value / 10) % 10, value % 10]);
        break;
      }
      case 'StoreRegisters':
        memory.writeBlock(s.i, v.subarray(0, ins.x + 1));
        if (this.options.quirks.memoryIncrementsI) s.i = (s.i + ins.x + 1) & 0xFFFF;
        break;
      case 'LoadRegisters':
        v.set(memory.readBlock(s.i, ins.x + 1), 0);
        if (this.options.quirks.memoryIncrementsI) s.i = (s.i + ins.x + 1) & 0xFFFF;
        break;
      default: {
        const unreachable: never = ins;
        throw new Error(`unhandled instruction ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private skip() {
    this.state.pc = (this.state.pc + 2) & 0xFFFF;
  }

  // XOR n rows from memory[I..] at (Vx, Vy). Only the start position wraps; pixels past an edge are dropped.
  private drawSprite(rx: number, ry: number, n: number) {
    const { memory, display } = this.bus;
    const v = this.state.v;
    const sprite = memory.readBlock(this.state.i, n);

    const startX = v[rx] >= DISPLAY_WIDTH ? v[rx] % DISPLAY_WIDTH : v[rx];
    const startY = v[ry] >= DISPLAY_HEIGHT ? v[ry] % DISPLAY_HEIGHT : v[ry];
    trace('draw', () => `drawing ${n} bytes at ${startX},${startY}`);

    v[VF] = 0;
    for (let row = 0; row < sprite.length; row++) {
      const bits = sprite[row];
      for (let col = 0; col < 8; col++) {
        const spritePixel = (bits >>> (7 - col)) & 1;
        const x = startX + col, y = startY + row;
        const old = display.getPixel(x, y);
        if (old === undefined || spritePixel === 0) continue;
        if (old === 1) v[VF] = 1;
        display.setPixel(x, y, old === 0);
      }
    }
    display.markRedraw();

    if (isTraceEnabled('draw')) {
      trace('draw', `finished drawing, VF: ${v[VF]}`);
      trace('draw', () => `vram:\n${renderText(display.copy())}`);
    }
  }
}
