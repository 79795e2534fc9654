import type { Address, Byte, Word } from '@core/cpu/types';
import FONT_GLYPHS from './fontset.json';

export const MEMORY_SIZE = 0x1000;
export const MEMORY_END = MEMORY_SIZE - 1;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START; // 3584
export const FONT_START = 0x050;
export const FONT_GLYPH_SIZE = 5;

// 4KB RAM. 0x000-0x1FF belongs to the interpreter (font at 0x050-0x09F),
// programs live at 0x200-0xFFF.
export class Memory {
  private ram = new Uint8Array(MEMORY_SIZE);

  constructor() {
    this.reset();
  }

  reset(): void {
    this.ram.fill(0);
    FONT_GLYPHS.forEach((glyph, digit) => {
      this.ram.set(glyph, FONT_START + digit * FONT_GLYPH_SIZE);
    });
  }

  // True when [addr, addr + length) lies inside RAM.
  inBounds(addr: number, length = 1): boolean {
    return addr >= 0 && length >= 0 && addr + length <= MEMORY_SIZE;
  }

  read(addr: Address): Byte {
    return this.ram[addr & MEMORY_END];
  }

  write(addr: Address, value: Byte): void {
    this.ram[addr & MEMORY_END] = value & 0xff;
  }

  // Big-endian opcode fetch; callers check inBounds(addr, 2) first.
  read16(addr: Address): Word {
    return (this.read(addr) << 8) | this.read(addr + 1);
  }

  // Copy of [addr, addr + length), clipped to RAM.
  slice(addr: Address, length: number): Uint8Array {
    return this.ram.slice(addr, Math.min(MEMORY_SIZE, addr + length));
  }

  // Copies a program image to 0x200 and zeroes the rest of the program region.
  loadProgram(image: Uint8Array): void {
    const n = Math.min(image.length, MAX_PROGRAM_SIZE);
    this.ram.fill(0, PROGRAM_START);
    this.ram.set(image.subarray(0, n), PROGRAM_START);
  }
}

export const fontAddress = (digit: number): Address => FONT_START + (digit & 0x0f) * FONT_GLYPH_SIZE;
