import fs from 'node:fs'
import path from 'node:path'
import { ROM_CAPACITY } from '@core/bus/memory'

export function getEnv(name: string): string | null { const v = process.env[name]; return v && v.length > 0 ? v : null }

// --key=value flags plus bare positionals
export function parseArgv(argv: string[]): { flags: Map<string, string>, positional: string[] } {
  const flags = new Map<string, string>()
  const positional: string[] = []
  for (const a of argv) {
    const m = /^--([^=]+)(?:=(.*))?$/.exec(a)
    if (m) flags.set(m[1], m[2] ?? '1')
    else positional.push(a)
  }
  return { flags, positional }
}

export function intFlag(raw: string | undefined | null, fallback: number): number {
  if (!raw) return fallback
  const n = /^0x/i.test(raw) ? parseInt(raw.slice(2), 16) : parseInt(raw, 10)
  return Number.isFinite(n) && n >= 0 ? n : fallback
}

// Reads the ROM named by the first positional or CHIP8_ROM; exits 2 when missing or oversized
export function readRomOrExit(positional: string[]): { path: string, rom: Uint8Array } {
  const romPath = positional[0] ?? getEnv('CHIP8_ROM')
  if (!romPath) { console.error('Usage: tsx <script> <rom.ch8> [--flags]'); process.exit(2) }
  const resolved = path.resolve(romPath)
  if (!fs.existsSync(resolved)) { console.error(`ROM not found: ${resolved}`); process.exit(2) }
  const rom = new Uint8Array(fs.readFileSync(resolved))
  if (rom.length > ROM_CAPACITY) { console.error(`ROM too large: ${rom.length} > ${ROM_CAPACITY} bytes`); process.exit(2) }
  return { path: resolved, rom }
}
