import type { Byte, Word } from '@core/cpu/types';
import { MemoryAccessError, RomTooLargeError } from '@core/errors';
import glyphs from './font.json';

export const MEMORY_SIZE = 0x1000;
// Initial program counter and the offset the ROM is copied to
export const PC_INIT = 0x200;
export const ROM_CAPACITY = MEMORY_SIZE - PC_INIT;

export const FONT_BASE = 0x000;
export const FONT_GLYPH_BYTES = 5;
// Hex digit glyphs 0..F, five rows each, high nibble used
export const FONT: Uint8Array = Uint8Array.from(glyphs.flat());

// 4KB address space. Every access is bounds-checked; nothing wraps.
export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);
  private romImage: Uint8Array | null = null;

  constructor() {
    this.reset();
  }

  // Zero memory, reinstall the font and re-copy the last loaded ROM (if any)
  reset(): void {
    this.ram.fill(0);
    this.ram.set(FONT, FONT_BASE);
    if (this.romImage) this.ram.set(this.romImage, PC_INIT);
  }

  loadRom(rom: Uint8Array): void {
    if (rom.length > ROM_CAPACITY) throw new RomTooLargeError(rom.length, ROM_CAPACITY);
    this.romImage = rom.slice();
    this.ram.set(this.romImage, PC_INIT);
  }

  get size(): number { return this.ram.length; }

  // Throws unless [addr, addr+length) lies inside memory
  check(addr: number, length = 1): void {
    if (addr < 0 || length < 0 || addr + length > MEMORY_SIZE) throw new MemoryAccessError(addr, length);
  }

  read(addr: Word): Byte {
    this.check(addr);
    return this.ram[addr];
  }

  write(addr: Word, value: Byte): void {
    this.check(addr);
    this.ram[addr] = value & 0xFF;
  }

  // Big-endian instruction word
  readWord(addr: Word): Word {
    this.check(addr, 2);
    return (this.ram[addr] << 8) | this.ram[addr + 1];
  }

  readBlock(addr: Word, length: number): Uint8Array {
    this.check(addr, length);
    return this.ram.slice(addr, addr + length);
  }

  writeBlock(addr: Word, data: ArrayLike<number>): void {
    this.check(addr, data.length);
    for (let k = 0; k < data.length; k++) this.ram[addr + k] = data[k] & 0xFF;
  }
}
