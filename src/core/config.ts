// Typed options with CHIP8_* environment defaults. Explicit options always win.

export interface Quirks {
  // 8xy1/8xy2/8xy3 force VF to 0
  logicResetsVF: boolean;
  // Fx55/Fx65 leave I advanced by x + 1
  memoryIncrementsI: boolean;
}

export interface Chip8Options {
  quirks: Quirks;
  stackDepth: number;
  historySize: number;
}

export type UnknownOpcodePolicy = 'halt' | 'skip';

export interface DriverOptions {
  hz: number; // instructions per second
  onUnknownOpcode: UnknownOpcodePolicy;
}

export const DEFAULT_QUIRKS: Quirks = { logicResetsVF: true, memoryIncrementsI: true };
export const DEFAULT_HZ = 700;
export const DEFAULT_STACK_DEPTH = 16;
export const DEFAULT_HISTORY_SIZE = 64;

export type Chip8OptionsInput = Partial<Omit<Chip8Options, 'quirks'>> & { quirks?: Partial<Quirks> };

type Env = Record<string, string | undefined>;

function envBool(env: Env, name: string, fallback: boolean): boolean {
  const v = env[name];
  if (v === undefined || v === '') return fallback;
  return v === '1' || v.toLowerCase() === 'true';
}

function envInt(env: Env, name: string, fallback: number, min: number): number {
  const v = env[name];
  if (!v || !/^\d+$/.test(v)) return fallback;
  const n = parseInt(v, 10);
  return n >= min ? n : fallback;
}

export function resolveOptions(opts: Chip8OptionsInput = {}, env: Env = process.env): Chip8Options {
  return {
    quirks: {
      logicResetsVF: opts.quirks?.logicResetsVF ?? envBool(env, 'CHIP8_QUIRK_LOGIC_VF', DEFAULT_QUIRKS.logicResetsVF),
      memoryIncrementsI: opts.quirks?.memoryIncrementsI ?? envBool(env, 'CHIP8_QUIRK_MEMORY_I', DEFAULT_QUIRKS.memoryIncrementsI),
    },
    stackDepth: opts.stackDepth ?? envInt(env, 'CHIP8_STACK_DEPTH', DEFAULT_STACK_DEPTH, 1),
    historySize: opts.historySize ?? envInt(env, 'CHIP8_HISTORY', DEFAULT_HISTORY_SIZE, 1),
  };
}

export function resolveDriverOptions(opts: Partial<DriverOptions> = {}, env: Env = process.env): DriverOptions {
  const policy = env.CHIP8_ON_UNKNOWN === 'skip' ? 'skip' : 'halt';
  return {
    hz: opts.hz ?? envInt(env, 'CHIP8_HZ', DEFAULT_HZ, 1),
    onUnknownOpcode: opts.onUnknownOpcode ?? policy,
  };
}

