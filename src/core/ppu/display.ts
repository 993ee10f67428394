export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

// Linear index for (x, y); undefined outside the screen
export function vramIndex(x: number, y: number): number | undefined {
  if (x < 0 || y < 0 || x >= DISPLAY_WIDTH || y >= DISPLAY_HEIGHT) return undefined;
  return DISPLAY_WIDTH * y + x;
}

// 64x32 one-byte-per-pixel framebuffer (0 or 1 per cell), row-major.
export class Display {
  private vram = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  // Set on every mutation; only the renderer clears it.
  private dirty = false;

  get redraw(): boolean { return this.dirty; }
  clearRedraw(): void { this.dirty = false; }
  markRedraw(): void { this.dirty = true; }

  clear(): void {
    this.vram.fill(0);
    this.dirty = true;
  }

  getPixel(x: number, y: number): 0 | 1 | undefined {
    const idx = vramIndex(x, y);
    if (idx === undefined) return undefined;
    return this.vram[idx] ? 1 : 0;
  }

  // No-op outside the screen
  setPixel(x: number, y: number, on: boolean): void {
    const idx = vramIndex(x, y);
    if (idx === undefined) return;
    this.vram[idx] = on ? 1 : 0;
  }

  // Fresh copy; callers never see the live buffer
  copy(): Uint8Array { return this.vram.slice(); }

  reset(): void {
    this.vram.fill(0);
    this.dirty = false;
  }
}
