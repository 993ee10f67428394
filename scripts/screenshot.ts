#!/usr/bin/env node
/* eslint-disable no-console */
// Run a ROM headless and write the display to a scaled PNG.
//   tsx scripts/screenshot.ts roms/ibm.ch8 --out=screenshots/ibm.png --frames=60 --scale=8
import fs from 'node:fs'
import path from 'node:path'
import { PNG } from 'pngjs'
import { Chip8System } from '@core/system/system'
import { CycleDriver } from '@core/system/driver'
import { DISPLAY_WIDTH, DISPLAY_HEIGHT } from '@core/ppu/display'
import { parseArgv, intFlag, readRomOrExit } from './lib/args'

const ON: [number, number, number] = [0x66, 0x66, 0x99]
const OFF: [number, number, number] = [0x29, 0x29, 0x3d]

const writePngScaled = async (outPath: string, vram: Uint8Array, scale: number): Promise<void> => {
  const W = DISPLAY_WIDTH * scale, H = DISPLAY_HEIGHT * scale
  const png = new PNG({ width: W, height: H })
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    for (let x = 0; x < DISPLAY_WIDTH; x++) {
      const [r, g, b] = vram[y * DISPLAY_WIDTH + x] ? ON : OFF
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + x * scale + dx) << 2
          png.data[o + 0] = r
          png.data[o + 1] = g
          png.data[o + 2] = b
          png.data[o + 3] = 255
        }
      }
    }
  }
  fs.mkdirSync(path.dirname(outPath), { recursive: true })
  const stream = fs.createWriteStream(outPath)
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (e) => reject(e))
    png.pack().pipe(stream)
  })
}

async function main() {
  const { flags, positional } = parseArgv(process.argv.slice(2))
  const { path: romPath, rom } = readRomOrExit(positional)
  const out = path.resolve(flags.get('out') ?? path.join('screenshots', path.basename(romPath).replace(/\.[^.]+$/, '') + '.png'))
  const scale = Math.max(1, intFlag(flags.get('scale'), 8))

  const system = new Chip8System()
  system.loadRom(rom)
  const driver = new CycleDriver(system)
  driver.runFrames(intFlag(flags.get('frames'), 60))
  if (driver.lastError) console.error(`stopped early: ${driver.lastError.message}`)

  await writePngScaled(out, system.display.copy(), scale)
  console.log(JSON.stringify({ rom: romPath, out, width: DISPLAY_WIDTH * scale, height: DISPLAY_HEIGHT * scale }))
}

main().catch((e) => { console.error(e); process.exit(1) })
