import type { Byte } from '@core/cpu/types';

export const TIMER_HZ = 60;

// Delay and sound timers. Instructions only read/write them; the host's
// 60 Hz clock calls tick().
export class Timers {
  delay: Byte = 0;
  sound: Byte = 0;

  reset(): void {
    this.delay = 0;
    this.sound = 0;
  }

  setDelay(value: Byte): void { this.delay = value & 0xff; }
  setSound(value: Byte): void { this.sound = value & 0xff; }

  tick(): void {
    if (this.delay > 0) this.delay--;
    if (this.sound > 0) this.sound--;
  }
}
