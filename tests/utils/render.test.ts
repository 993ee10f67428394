import { describe, it, expect } from 'vitest';
import { renderText, renderHalfBlocks, litPixels } from '@utils/render';
import { crc32, crc32Hex } from '@utils/crc32';

function vramWith(points: Array<[number, number]>): Uint8Array {
  const vram = new Uint8Array(64 * 32);
  for (const [x, y] of points) vram[y * 64 + x] = 1;
  return vram;
}

describe('display rendering', () => {
  it('renders one text line per row', () => {
    const lines = renderText(vramWith([[0, 0], [63, 31]])).split('\n');
    expect(lines).toHaveLength(32);
    expect(lines[0]).toBe('#' + '.'.repeat(63));
    expect(lines[31]).toBe('.'.repeat(63) + '#');
    expect(lines[1]).toBe('.'.repeat(64));
  });

  it('accepts custom glyphs', () => {
    const first = renderText(vramWith([[1, 0]]), { on: 'X', off: ' ' }).split('\n')[0];
    expect(first).toBe(' X' + ' '.repeat(62));
  });

  it('packs two rows into half blocks', () => {
    const lines = renderHalfBlocks(vramWith([[0, 0], [0, 1], [1, 0], [2, 1]])).split('\n');
    expect(lines).toHaveLength(16);
    expect(lines[0].slice(0, 4)).toBe('█▀▄ ');
  });

  it('counts lit pixels', () => {
    expect(litPixels(vramWith([[0, 0], [5, 5], [63, 31]]))).toBe(3);
  });
});

describe('crc32', () => {
  it('matches the standard check value', () => {
    const bytes = new TextEncoder().encode('123456789');
    expect(crc32(bytes)).toBe(0xCBF43926);
    expect(crc32Hex(bytes)).toBe('cbf43926');
  });
});
