import type { Word } from './types';
import type { Instruction } from './instructions';

export interface StepRecord {
  pc: Word; // address the word was fetched from
  opcode: Word;
  instruction: Instruction;
}

// Append-only ring of executed steps; the oldest entries fall off at capacity
export class InstructionHistory {
  private ring: (StepRecord | undefined)[];
  private idx = 0;
  private count = 0;

  constructor(readonly capacity = 64) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`history capacity must be >= 1, got ${capacity}`);
    this.ring = new Array<StepRecord | undefined>(capacity).fill(undefined);
  }

  get size(): number { return this.count; }

  push(rec: StepRecord): void {
    this.ring[this.idx] = rec;
    this.idx = (this.idx + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  // Up to `count` most recent entries, oldest -> newest
  recent(count = this.capacity): StepRecord[] {
    const n = Math.min(Math.max(0, count), this.count);
    const out: StepRecord[] = [];
    for (let k = n; k > 0; k--) {
      const rec = this.ring[(this.idx - k + this.capacity) % this.capacity];
      if (rec) out.push(rec);
    }
    return out;
  }

  clear(): void {
    this.ring.fill(undefined);
    this.idx = 0;
    this.count = 0;
  }
}
