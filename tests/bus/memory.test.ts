import { describe, it, expect } from 'vitest';
import { FONT_START, MAX_PROGRAM_SIZE, Memory, PROGRAM_START, fontAddress } from '@core/bus/memory';

describe('Memory', () => {
  it('installs the font glyphs at 0x050', () => {
    const mem = new Memory();
    expect(Array.from(mem.slice(FONT_START, 5))).toEqual([0xF0, 0x90, 0x90, 0x90, 0xF0]);
    expect(Array.from(mem.slice(fontAddress(0xF), 5))).toEqual([0xF0, 0x80, 0xF0, 0x80, 0x80]);
    expect(mem.read(0x04F)).toBe(0);
    expect(mem.read(0x0A0)).toBe(0);
  });

  it('reads words big-endian', () => {
    const mem = new Memory();
    mem.write(0x200, 0x12);
    mem.write(0x201, 0x34);
    expect(mem.read16(0x200)).toBe(0x1234);
  });

  it('checks ranges against the 4KB limit', () => {
    const mem = new Memory();
    expect(mem.inBounds(0xFFE, 2)).toBe(true);
    expect(mem.inBounds(0xFFF, 2)).toBe(false);
    expect(mem.inBounds(0x1000)).toBe(false);
    expect(mem.inBounds(0xFFF, 0)).toBe(true);
  });

  it('loads a program at 0x200 and clears what a previous one left', () => {
    const mem = new Memory();
    mem.loadProgram(new Uint8Array([1, 2, 3, 4]));
    mem.loadProgram(new Uint8Array([9]));
    expect(Array.from(mem.slice(PROGRAM_START, 4))).toEqual([9, 0, 0, 0]);
    expect(MAX_PROGRAM_SIZE).toBe(3584);
  });

  it('reset zeroes RAM and keeps the font', () => {
    const mem = new Memory();
    mem.write(0x300, 0xAA);
    mem.write(FONT_START, 0);
    mem.reset();
    expect(mem.read(0x300)).toBe(0);
    expect(mem.read(FONT_START)).toBe(0xF0);
  });
});
