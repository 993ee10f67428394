#!/usr/bin/env node
/* eslint-disable no-console */
// Headless run: step a ROM at the configured rate for N frames, then print the display.
//   tsx scripts/run-rom.ts roms/ibm.ch8 --frames=120 --hz=700 --on-unknown=skip --trace=instr,draw
import { Chip8System } from '@core/system/system'
import { CycleDriver } from '@core/system/driver'
import { renderHalfBlocks, renderText } from '@utils/render'
import { crc32Hex } from '@utils/crc32'
import { parseTraceTargets, setTraceTargets } from '@utils/trace'
import { parseArgv, intFlag, readRomOrExit } from './lib/args'

async function main() {
  const { flags, positional } = parseArgv(process.argv.slice(2))
  const { path: romPath, rom } = readRomOrExit(positional)
  const traceFlag = flags.get('trace')
  if (traceFlag) setTraceTargets(parseTraceTargets(traceFlag))

  const system = new Chip8System()
  system.loadRom(rom)
  const onUnknown = flags.get('on-unknown')
  const driver = new CycleDriver(system, {
    hz: flags.has('hz') ? intFlag(flags.get('hz'), 700) : undefined,
    onUnknownOpcode: onUnknown === 'skip' || onUnknown === 'halt' ? onUnknown : undefined,
  })

  const frames = intFlag(flags.get('frames'), 60)
  let steps = 0
  for (let f = 0; f < frames && !driver.halted; f++) {
    steps += driver.runFrame().steps
    if (system.mode.kind === 'waitForKey') break
  }

  const vram = system.display.copy()
  system.display.clearRedraw()
  console.log(flags.has('ascii') ? renderText(vram) : renderHalfBlocks(vram))
  const snap = system.snapshot()
  console.log(JSON.stringify({
    rom: romPath,
    steps,
    pc: snap.pc,
    mode: snap.mode.kind,
    halted: driver.halted,
    error: driver.lastError?.message ?? null,
    display_crc: crc32Hex(vram),
  }))
  process.exit(driver.halted ? 1 : 0)
}

main().catch((e) => { console.error(e); process.exit(1) })
