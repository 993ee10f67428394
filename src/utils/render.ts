import { DISPLAY_WIDTH, DISPLAY_HEIGHT } from '@core/ppu/display';

export interface TextRenderOptions {
  on?: string;
  off?: string;
}

// One line per display row
export function renderText(vram: Uint8Array, opts: TextRenderOptions = {}): string {
  const on = opts.on ?? '#';
  const off = opts.off ?? '.';
  const lines: string[] = [];
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    let line = '';
    for (let x = 0; x < DISPLAY_WIDTH; x++) line += vram[y * DISPLAY_WIDTH + x] ? on : off;
    lines.push(line);
  }
  return lines.join('\n');
}

// Two display rows per terminal line using half-block glyphs
export function renderHalfBlocks(vram: Uint8Array): string {
  const lines: string[] = [];
  for (let y = 0; y < DISPLAY_HEIGHT; y += 2) {
    let line = '';
    for (let x = 0; x < DISPLAY_WIDTH; x++) {
      const top = vram[y * DISPLAY_WIDTH + x] === 1;
      const bottom = vram[(y + 1) * DISPLAY_WIDTH + x] === 1;
      line += top && bottom ? '█' : top ? '▀' : bottom ? '▄' : ' ';
    }
    lines.push(line);
  }
  return lines.join('\n');
}

// Count of lit pixels, handy for smoke checks
export function litPixels(vram: Uint8Array): number {
  let n = 0;
  for (let k = 0; k < vram.length; k++) if (vram[k]) n++;
  return n;
}
