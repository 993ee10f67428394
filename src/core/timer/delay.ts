import type { Byte } from '@core/cpu/types';

export const DELAY_TIMER_HZ = 60;

// 8-bit countdown, decremented by an external 60 Hz clock, floored at zero
export class DelayTimer {
  private counter: Byte = 0;

  get value(): Byte { return this.counter; }

  set(value: Byte): void { this.counter = value & 0xFF; }

  tick(): void {
    if (this.counter > 0) this.counter--;
  }

  reset(): void { this.counter = 0; }
}
