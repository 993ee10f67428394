#!/usr/bin/env node
/* eslint-disable no-console */
// Print one trace line per executed instruction, state shown before execution.
//   tsx scripts/trace-rom.ts roms/test.ch8 --max=500 --tick-every=11
import { Chip8System } from '@core/system/system'
import { formatTraceLine } from '@utils/disasm'
import { parseArgv, intFlag, readRomOrExit, getEnv } from './lib/args'

async function main() {
  const { flags, positional } = parseArgv(process.argv.slice(2))
  const { rom } = readRomOrExit(positional)
  const max = intFlag(flags.get('max') ?? getEnv('TRACE_MAX'), 1000)
  // Timer tick cadence in instructions; 0 disables the timer
  const tickEvery = intFlag(flags.get('tick-every'), 0)

  const system = new Chip8System()
  system.loadRom(rom)

  for (let n = 0; n < max; n++) {
    const s = system.cpu.state
    let opcode: number
    try {
      opcode = system.memory.readWord(s.pc)
    } catch (e) {
      console.error(e instanceof Error ? e.message : e)
      process.exit(1)
    }
    console.log(formatTraceLine(s.pc, opcode, { v: s.v, i: s.i, sp: s.stack.length, dt: system.timer.value }))
    try {
      if (!system.cycle()) { console.log(`-- blocked (${system.mode.kind})`); break }
    } catch (e) {
      console.error(`-- ${e instanceof Error ? `${e.name}: ${e.message}` : String(e)}`)
      process.exit(1)
    }
    if (tickEvery > 0 && (n + 1) % tickEvery === 0) system.tickTimer()
  }
}

main().catch((e) => { console.error(e); process.exit(1) })
