export const KEY_COUNT = 16;

// Hex keypad, 0x0-0xF. Each latch is set and cleared by the host; the CPU only
// reads them (Ex9E, ExA1, Fx0A).
export class Keypad {
  private pressed: boolean[] = new Array<boolean>(KEY_COUNT).fill(false);

  static isValidKey(key: number): boolean {
    return Number.isInteger(key) && key >= 0 && key < KEY_COUNT;
  }

  // Out-of-range keys are ignored.
  setKey(key: number, down: boolean): void {
    if (!Keypad.isValidKey(key)) return;
    this.pressed[key] = down;
  }

  isPressed(key: number): boolean {
    return Keypad.isValidKey(key) && this.pressed[key];
  }

  // Lowest-numbered key currently held, or null when none is.
  firstPressed(): number | null {
    const idx = this.pressed.indexOf(true);
    return idx >= 0 ? idx : null;
  }

  releaseAll(): void {
    this.pressed.fill(false);
  }
}
