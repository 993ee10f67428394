import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { systemWithProgram } from '../helpers/vmh';
import { MemoryAccessError } from '@core/errors';

describe('Dxyn sprite drawing', () => {
  it('draws the font glyph for 0 at the origin', () => {
    const { sys, v } = systemWithProgram([0xF029, 0xD005]);
    v[0xF] = 1;
    sys.stepInstruction();
    sys.stepInstruction();
    const d = sys.display;
    // F0 90 90 90 F0
    expect([0, 1, 2, 3, 4].map((x) => d.getPixel(x, 0))).toEqual([1, 1, 1, 1, 0]);
    expect([0, 1, 2, 3].map((x) => d.getPixel(x, 1))).toEqual([1, 0, 0, 1]);
    expect(d.getPixel(0, 5)).toBe(0);
    expect(v[0xF]).toBe(0);
    expect(d.redraw).toBe(true);
  });

  it('XORs over existing pixels and reports collision when a set pixel clears', () => {
    // glyph 0 row 0 is F0, glyph 1 row 0 is 20: they overlap at (2,0)
    const { sys, v } = systemWithProgram([0xD015, 0xF229, 0xD015]);
    v[2] = 1;
    sys.stepInstruction();
    expect(v[0xF]).toBe(0);
    sys.stepInstruction();
    sys.stepInstruction();
    expect(v[0xF]).toBe(1);
    expect(sys.display.getPixel(2, 0)).toBe(0);
    expect(sys.display.getPixel(0, 0)).toBe(1);
  });

  it('drawing the same sprite twice restores the buffer and flags collision', () => {
    const { sys, v } = systemWithProgram([0xF029, 0xD005, 0xD005]);
    sys.stepInstruction();
    sys.stepInstruction();
    const before = sys.display.copy();
    expect(before.some((p) => p === 1)).toBe(true);
    sys.stepInstruction();
    expect(sys.display.copy().every((p) => p === 0)).toBe(true);
    expect(v[0xF]).toBe(1);
  });

  it('double draw is an identity on any prior buffer', () => {
    fc.assert(fc.property(
      fc.uint8Array({ minLength: 1, maxLength: 15 }),
      fc.integer({ min: 0, max: 255 }),
      fc.integer({ min: 0, max: 255 }),
      fc.uint8Array({ minLength: 15, maxLength: 15 }),
      (sprite, x, y, background) => {
        const n = sprite.length;
        const draw = 0xD010 | n;
        const { sys, v } = systemWithProgram([0xA300, 0xD235, 0xA300 + 0x10, draw, draw]);
        sys.memory.writeBlock(0x300, background.subarray(0, 5));
        sys.memory.writeBlock(0x310, sprite);
        v[2] = 3; v[3] = 4;
        sys.stepInstruction();
        sys.stepInstruction();
        v[0] = x; v[1] = y;
        sys.stepInstruction();
        const before = sys.display.copy();
        sys.stepInstruction();
        sys.stepInstruction();
        expect(sys.display.copy()).toEqual(before);
      },
    ), { numRuns: 50 });
  });

  it('wraps only the start position', () => {
    const { sys, v } = systemWithProgram([0xF229, 0xD015]);
    v[0] = 70; v[1] = 40; v[2] = 0; // -> start (6, 8)
    sys.stepInstruction();
    sys.stepInstruction();
    expect(sys.display.getPixel(6, 8)).toBe(1);
    expect(sys.display.getPixel(10, 8)).toBe(0);
  });

  it('clips pixels past the right and bottom edges instead of wrapping them', () => {
    const { sys, v } = systemWithProgram([0xF229, 0xD015]);
    v[0] = 62; v[1] = 30; v[2] = 0;
    sys.stepInstruction();
    sys.stepInstruction();
    const d = sys.display;
    expect(d.getPixel(62, 30)).toBe(1);
    expect(d.getPixel(63, 30)).toBe(1);
    expect(d.getPixel(62, 31)).toBe(1);
    expect(d.getPixel(63, 31)).toBe(0);
    // nothing spilled onto the opposite edges
    expect(d.copy().reduce((acc, p) => acc + p, 0)).toBe(3);
  });

  it('rejects a sprite read past the end of memory before touching anything', () => {
    const { sys, v } = systemWithProgram([0xD015]);
    sys.cpu.state.i = 0xFFE;
    v[0xF] = 7;
    expect(() => sys.stepInstruction()).toThrow(MemoryAccessError);
    expect(v[0xF]).toBe(7);
    expect(sys.display.redraw).toBe(false);
  });

  it('00E0 clears the buffer and marks redraw; the flag stays until consumed', () => {
    const { sys } = systemWithProgram([0xD005, 0x00E0, 0x6000]);
    sys.stepInstruction();
    sys.display.clearRedraw();
    sys.stepInstruction();
    expect(sys.display.copy().every((p) => p === 0)).toBe(true);
    expect(sys.display.redraw).toBe(true);
    sys.stepInstruction();
    expect(sys.display.redraw).toBe(true);
    sys.display.clearRedraw();
    expect(sys.display.redraw).toBe(false);
  });
});
