import { describe, it, expect } from 'vitest';
import { Keypad } from '@core/input/keypad';

describe('Keypad', () => {
  it('latches keys until released', () => {
    const k = new Keypad();
    k.setKey(0xA, true);
    expect(k.isPressed(0xA)).toBe(true);
    k.setKey(0xA, false);
    expect(k.isPressed(0xA)).toBe(false);
  });

  it('reports the lowest held key', () => {
    const k = new Keypad();
    expect(k.firstPressed()).toBeNull();
    k.setKey(0xF, true);
    k.setKey(0x3, true);
    expect(k.firstPressed()).toBe(0x3);
    k.releaseAll();
    expect(k.firstPressed()).toBeNull();
  });

  it('ignores keys outside the keypad', () => {
    const k = new Keypad();
    k.setKey(16, true);
    k.setKey(-1, true);
    expect(k.firstPressed()).toBeNull();
    expect(k.isPressed(16)).toBe(false);
    expect(Keypad.isValidKey(0xF)).toBe(true);
    expect(Keypad.isValidKey(2.5)).toBe(false);
  });
});
