/* eslint-disable no-console */
import { Chip8System } from './system';
import { DecodeError, isFatal } from '@core/errors';
import { DELAY_TIMER_HZ } from '@core/timer/delay';
import { resolveDriverOptions, type DriverOptions } from '@core/config';

export interface FrameResult {
  steps: number; // instructions executed this frame
  redraw: boolean; // display changed and has not been consumed yet
  halted: boolean;
  error?: Error;
}

// Paces a Chip8System: `stepsPerTick` instructions, then one 60 Hz delay-timer tick.
export class CycleDriver {
  readonly options: DriverOptions;
  readonly stepsPerTick: number;
  private _halted = false;
  private _lastError: Error | null = null;
  private interval: ReturnType<typeof setInterval> | null = null;

  constructor(public readonly system: Chip8System, opts: Partial<DriverOptions> = {}) {
    this.options = resolveDriverOptions(opts);
    this.stepsPerTick = Math.max(1, Math.round(this.options.hz / DELAY_TIMER_HZ));
  }

  get halted(): boolean { return this._halted; }
  get lastError(): Error | null { return this._lastError; }
  get running(): boolean { return this.interval !== null; }

  // Clear a halt (after a reset or ROM reload)
  clearHalt() {
    this._halted = false;
    this._lastError = null;
  }

  runFrame(): FrameResult {
    let steps = 0;
    let error: Error | undefined;
    if (!this._halted) {
      for (let k = 0; k < this.stepsPerTick; k++) {
        try {
          if (!this.system.cycle()) break; // paused or waiting for a key
          steps++;
        } catch (e) {
          if (e instanceof DecodeError && this.options.onUnknownOpcode === 'skip') {
            // fetch already moved PC past the word
            console.warn(`[driver] skipping ${e.message}`);
            continue;
          }
          error = e instanceof Error ? e : new Error(String(e));
          this.halt(error);
          break;
        }
      }
      this.system.tickTimer();
    }
    return { steps, redraw: this.system.display.redraw, halted: this._halted, error };
  }

  runFrames(count: number): FrameResult[] {
    const out: FrameResult[] = [];
    for (let k = 0; k < count && !this._halted; k++) out.push(this.runFrame());
    return out;
  }

  // Real-time pacing for interactive hosts. onFrame sees every frame result.
  start(onFrame?: (result: FrameResult) => void) {
    if (this.interval !== null) return;
    this.interval = setInterval(() => {
      const result = this.runFrame();
      if (onFrame) onFrame(result);
      if (result.halted) this.stop();
    }, 1000 / DELAY_TIMER_HZ);
  }

  stop() {
    if (this.interval === null) return;
    clearInterval(this.interval);
    this.interval = null;
  }

  private halt(error: Error) {
    this._halted = true;
    this._lastError = error;
    const kind = isFatal(error) ? 'fatal' : 'stopped';
    console.error(`[driver] ${kind}: ${error.message}`);
  }
}
