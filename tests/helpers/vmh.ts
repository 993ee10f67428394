import { Chip8System } from '@core/system/system';
import type { Chip8OptionsInput } from '@core/config';

// Big-endian byte image of 16-bit instruction words
export function program(words: number[]): Uint8Array {
  const out = new Uint8Array(words.length * 2);
  words.forEach((w, k) => {
    out[2 * k] = (w >>> 8) & 0xFF;
    out[2 * k + 1] = w & 0xFF;
  });
  return out;
}

export function systemWithProgram(words: number[], opts: Chip8OptionsInput = {}) {
  const sys = new Chip8System(opts);
  sys.loadRom(program(words));
  return { sys, cpu: sys.cpu, v: sys.cpu.state.v };
}

// Step n instructions unconditionally
export function run(sys: Chip8System, n: number) {
  for (let k = 0; k < n; k++) sys.stepInstruction();
}
