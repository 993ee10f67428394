import { Memory } from '@core/bus/memory';
import { Chip8CPU } from '@core/cpu/cpu';
import { InstructionHistory, type StepRecord } from '@core/cpu/history';
import type { Mode, Snapshot } from '@core/cpu/types';
import { Display } from '@core/ppu/display';
import { Keyboard } from '@core/input/keyboard';
import { keyForCode, DEFAULT_KEYMAP } from '@core/input/keymap';
import { DelayTimer } from '@core/timer/delay';
import { resolveOptions, type Chip8Options, type Chip8OptionsInput } from '@core/config';
import { trace } from '@utils/trace';

const RUNNING: Mode = { kind: 'running' };
const PAUSED: Mode = { kind: 'paused' };

export class Chip8System {
  public readonly memory: Memory;
  public readonly display: Display;
  public readonly keyboard: Keyboard;
  public readonly timer: DelayTimer;
  public readonly cpu: Chip8CPU;
  public readonly history: InstructionHistory;
  public readonly options: Chip8Options;
  private _mode: Mode = RUNNING;
  // Single-step permits granted while paused
  private stepBudget = 0;

  constructor(opts: Chip8OptionsInput = {}) {
    this.options = resolveOptions(opts);
    this.memory = new Memory();
    this.display = new Display();
    this.keyboard = new Keyboard();
    this.timer = new DelayTimer();
    this.history = new InstructionHistory(this.options.historySize);
    this.cpu = new Chip8CPU(
      { memory: this.memory, display: this.display, keyboard: this.keyboard, timer: this.timer },
      this.options,
    );
    this.cpu.setWaitForKeyHook((register) => {
      this._mode = { kind: 'waitForKey', register };
      trace('input', () => `waiting for key into V${register.toString(16).toUpperCase()}`);
    });
  }

  get mode(): Mode { return this._mode; }

  loadRom(rom: Uint8Array) {
    this.memory.loadRom(rom);
  }

  // Power-on state, keeping the loaded ROM
  reset() {
    this.memory.reset();
    this.display.reset();
    this.keyboard.reset();
    this.timer.reset();
    this.history.clear();
    this.cpu.reset();
    this._mode = RUNNING;
    this.stepBudget = 0;
  }

  // Unconditional fetch-decode-execute, regardless of mode
  stepInstruction(): StepRecord {
    const rec = this.cpu.step();
    this.history.push(rec);
    return rec;
  }

  canExecute(): boolean {
    switch (this._mode.kind) {
      case 'running': return true;
      case 'paused': return this.stepBudget > 0;
      case 'waitForKey': return false;
    }
  }

  /**
   * Execute one instruction if the mode allows it. Returns the step record, or
   * undefined when blocked (paused without a step request, or waiting for a key).
   * A step granted while paused leaves the machine paused afterwards.
   */
  cycle(): StepRecord | undefined {
    if (!this.canExecute()) return undefined;
    const singleStep = this._mode.kind === 'paused';
    if (singleStep) this.stepBudget--;
    const rec = this.stepInstruction();
    // Fx0A executed during a single step still takes effect
    if (singleStep && this._mode.kind === 'running') this._mode = PAUSED;
    return rec;
  }

  tickTimer() {
    this.timer.tick();
    trace('timer', () => `delay timer ${this.timer.value}`);
  }

  // Running -> Paused. Ignored (false) in any other mode.
  pause(): boolean {
    if (this._mode.kind !== 'running') return false;
    this._mode = PAUSED;
    this.stepBudget = 0;
    return true;
  }

  // Paused -> Running. Ignored (false) in any other mode.
  resume(): boolean {
    if (this._mode.kind !== 'paused') return false;
    this._mode = RUNNING;
    this.stepBudget = 0;
    return true;
  }

  // Allow exactly one more cycle while paused
  requestStep(): boolean {
    if (this._mode.kind !== 'paused') return false;
    this.stepBudget = 1;
    return true;
  }

  keyDown(key: number) {
    this.keyboard.setDown(key);
    trace('input', () => `down ${key.toString(16).toUpperCase()} ${this.keyboard.describe()}`);
  }

  // A release while waiting delivers the key and resumes
  keyUp(key: number) {
    this.keyboard.setUp(key);
    trace('input', () => `up ${key.toString(16).toUpperCase()} ${this.keyboard.describe()}`);
    if (this._mode.kind === 'waitForKey') {
      this.cpu.state.v[this._mode.register] = key;
      this._mode = RUNNING;
    }
  }

  // Physical key event by KeyboardEvent.code; false when the code is unmapped
  handleKey(code: string, down: boolean, keymap: Readonly<Record<string, number>> = DEFAULT_KEYMAP): boolean {
    const key = keyForCode(code, keymap);
    if (key === undefined) return false;
    if (down) this.keyDown(key); else this.keyUp(key);
    return true;
  }

  snapshot(): Snapshot {
    const s = this.cpu.state;
    return {
      registers: Array.from(s.v),
      pc: s.pc,
      i: s.i,
      stack: s.stack.slice(),
      delayTimer: this.timer.value,
      mode: { ...this._mode },
      keys: this.keyboard.mask,
    };
  }
}
