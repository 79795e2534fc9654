import { describe, it, expect } from 'vitest';
import { interpreterWithProgram, stepN } from '../helpers/chip8h';
import { FONT_START } from '@core/bus/memory';

describe('Index register', () => {
  it('Annn loads I and Fx1E adds Vx within 12 bits', () => {
    const sys = interpreterWithProgram([0xAFFE, 0x6105, 0xF11E]);
    stepN(sys, 2);
    expect(sys.cpu.state.i).toBe(0xFFE);
    stepN(sys, 1);
    expect(sys.cpu.state.i).toBe(0x003);
  });

  it('Fx29 points I at the glyph of the low nibble of Vx', () => {
    const sys = interpreterWithProgram([0x610A, 0xF129, 0x61FB, 0xF129]);
    stepN(sys, 2);
    expect(sys.cpu.state.i).toBe(FONT_START + 10 * 5);
    stepN(sys, 2);
    expect(sys.cpu.state.i).toBe(FONT_START + 11 * 5);
  });
});

describe('BCD and register transfers', () => {
  it('Fx33 writes hundreds, tens and ones', () => {
    const sys = interpreterWithProgram([0x61FE, 0xA400, 0xF133]);
    stepN(sys, 3);
    expect([sys.peek(0x400), sys.peek(0x401), sys.peek(0x402)]).toEqual([2, 5, 4]);
    expect(sys.cpu.state.i).toBe(0x400);
  });

  it('Fx55 stores V0..Vx and Fx65 loads them back', () => {
    const sys = interpreterWithProgram([0x6011, 0x6122, 0x6233, 0x6344, 0xA500, 0xF255, 0x6000, 0x6100, 0x6200, 0xF265]);
    stepN(sys, 6);
    expect([sys.peek(0x500), sys.peek(0x501), sys.peek(0x502), sys.peek(0x503)]).toEqual([0x11, 0x22, 0x33, 0x00]);
    stepN(sys, 4);
    expect(Array.from(sys.cpu.state.v.slice(0, 4))).toEqual([0x11, 0x22, 0x33, 0x44]);
  });

  it('transfers that run past 0xFFF fail and change nothing', () => {
    const sys = interpreterWithProgram([0xAFFE, 0xF255]);
    stepN(sys, 1);
    expect(sys.step()).toEqual({ status: 'memory-out-of-bounds', pc: 0x202, address: 0xFFE });
    expect(sys.peek(0xFFE)).toBe(0);
    expect(sys.cpu.state.pc).toBe(0x202);

    const bcd = interpreterWithProgram([0xAFFE, 0xF033]);
    stepN(bcd, 1);
    expect(bcd.step().status).toBe('memory-out-of-bounds');

    const load = interpreterWithProgram([0xAFFF, 0xF165]);
    stepN(load, 1);
    expect(load.step().status).toBe('memory-out-of-bounds');
  });
});

describe('Timers and random', () => {
  it('Fx15, Fx18 and Fx07 move values between registers and timers', () => {
    const sys = interpreterWithProgram([0x6130, 0xF115, 0xF118, 0xF207]);
    stepN(sys, 4);
    expect(sys.getDelayTimer()).toBe(0x30);
    expect(sys.getSoundTimer()).toBe(0x30);
    expect(sys.cpu.state.v[2]).toBe(0x30);
  });

  it('step never ticks the timers', () => {
    const sys = interpreterWithProgram([0x6105, 0xF115, 0x1204]);
    stepN(sys, 10);
    expect(sys.getDelayTimer()).toBe(5);
    sys.tickTimers();
    expect(sys.getDelayTimer()).toBe(4);
  });

  it('Cxkk masks the injected random byte', () => {
    const sys = interpreterWithProgram([0xC10F, 0xC2F0], 0, { random: () => 0xAB });
    stepN(sys, 2);
    expect(sys.cpu.state.v[1]).toBe(0x0B);
    expect(sys.cpu.state.v[2]).toBe(0xA0);
  });
});
