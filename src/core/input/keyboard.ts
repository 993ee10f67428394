export const KEY_COUNT = 16;

function keyBit(key: number): number {
  if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) {
    throw new RangeError(`key index out of range: ${key}`);
  }
  return 1 << key;
}

// Hex keypad 0x0..0xF held as a 16-bit mask, bit n = key n down
export class Keyboard {
  private bits = 0;

  get mask(): number { return this.bits; }

  setDown(key: number) { this.bits |= keyBit(key); }
  setUp(key: number) { this.bits &= ~keyBit(key) & 0xFFFF; }
  isDown(key: number): boolean { return (this.bits & keyBit(key)) !== 0; }
  reset() { this.bits = 0; }

  // "[ 0: false, 1: true, ... ]" for trace output
  describe(): string {
    const parts: string[] = [];
    for (let k = 0; k < KEY_COUNT; k++) parts.push(`${k.toString(16).toUpperCase()}: ${this.isDown(k)}`);
    return `[ ${parts.join(', ')} ]`;
  }
}
