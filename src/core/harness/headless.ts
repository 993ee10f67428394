import { Chip8System } from '@core/system/system';
import { resolveDriverOptions, type Chip8OptionsInput } from '@core/config';
import { DELAY_TIMER_HZ } from '@core/timer/delay';
import { crc32 } from '@utils/crc32';

export interface RunResult {
  steps: number;
  reason: 'timeout' | 'fail' | 'blocked';
  message?: string;
  displayCrc: number; // CRC-32 of the display buffer at the end of the run
  system: Chip8System;
}

export interface RunOptions {
  maxSteps: number;
  hz?: number; // instruction rate the delay timer is paced against
  options?: Chip8OptionsInput;
}

// Load and step a ROM with no input, up to maxSteps instructions.
// The delay timer ticks every round(hz/60) steps, as under CycleDriver.
export function runRom(rom: Uint8Array, opts: RunOptions): RunResult {
  const system = new Chip8System(opts.options);
  system.loadRom(rom);
  const { hz } = resolveDriverOptions({ hz: opts.hz });
  const stepsPerTick = Math.max(1, Math.round(hz / DELAY_TIMER_HZ));

  let steps = 0;
  const done = (reason: RunResult['reason'], message?: string): RunResult =>
    ({ steps, reason, message, displayCrc: crc32(system.display.copy()), system });

  while (steps < opts.maxSteps) {
    try {
      // No key can arrive headless, so a wait would never end
      if (!system.cycle()) return done('blocked', 'waiting for key');
    } catch (e) {
      return done('fail', e instanceof Error ? e.message : String(e));
    }
    steps++;
    if (steps % stepsPerTick === 0) system.tickTimer();
  }
  return done('timeout');
}
