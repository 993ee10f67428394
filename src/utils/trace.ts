/* eslint-disable no-console */
// Console tracing gated by CHIP8_TRACE, e.g. CHIP8_TRACE=instr,draw or CHIP8_TRACE=all

export type TraceTarget = 'instr' | 'draw' | 'input' | 'timer';

export const TRACE_TARGETS: readonly TraceTarget[] = ['instr', 'draw', 'input', 'timer'];

const isTarget = (s: string): s is TraceTarget => (TRACE_TARGETS as readonly string[]).includes(s);

export function parseTraceTargets(raw: string | undefined): Set<TraceTarget> {
  const out = new Set<TraceTarget>();
  if (!raw) return out;
  for (const part of raw.split(',')) {
    const t = part.trim().toLowerCase();
    if (t === 'all' || t === '1') TRACE_TARGETS.forEach((x) => out.add(x));
    else if (isTarget(t)) out.add(t);
  }
  return out;
}

let enabled: Set<TraceTarget> | null = null;

function targets(): Set<TraceTarget> {
  if (!enabled) enabled = parseTraceTargets(process.env.CHIP8_TRACE);
  return enabled;
}

// Override the env selection (scripts pass --trace=...)
export function setTraceTargets(list: Iterable<TraceTarget>): void {
  enabled = new Set(list);
}

export function isTraceEnabled(target: TraceTarget): boolean {
  return targets().has(target);
}

// Message is built lazily so disabled targets cost nothing
export function trace(target: TraceTarget, message: string | (() => string)): void {
  if (!isTraceEnabled(target)) return;
  const text = typeof message === 'function' ? message() : message;
  console.log(`[${target}] ${text}`);
}
