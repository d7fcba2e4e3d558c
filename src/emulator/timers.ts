import { Byte, ITimers } from './types';

// Delay and sound timers: 8-bit down-counters the host ticks at 60 Hz.
export class Timers implements ITimers {
  private dt = 0;
  private st = 0;

  reset(): void {
    this.dt = 0;
    this.st = 0;
  }

  get delay(): Byte { return this.dt; }
  set delay(v: Byte) { this.dt = v & 0xff; }

  get sound(): Byte { return this.st; }
  set sound(v: Byte) { this.st = v & 0xff; }

  tick(): void {
    if (this.dt > 0) this.dt--;
    if (this.st > 0) this.st--;
  }

  isSoundActive(): boolean {
    return this.st > 0;
  }
}
