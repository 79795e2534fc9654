import { describe, it, expect } from 'vitest';
import { EmulatorSession, STATUS_DEFAULT, STATUS_PAUSED } from '@host/session';
import { Quirk } from '@core/cpu/quirks';
import type { RomReader } from '@core/cart/rom';
import { romFromWords } from '../helpers/chip8h';

const ROMS = new Map<string, Uint8Array>([
  // ADD V0, 1; JP 0x200
  ['count.ch8', romFromWords([0x7001, 0x1200])],
  // LD V0, 1; RET with empty stack
  ['crash.ch8', romFromWords([0x6001, 0x00EE])],
  // LD V1, 0x3C; LD ST, V1; JP 0x204
  ['beep.ch8', romFromWords([0x613C, 0xF118, 0x1204])],
]);

const readRom: RomReader = (path) => {
  const bytes = ROMS.get(path);
  return bytes ? { status: 'success', bytes } : { status: 'rom-not-found', path };
};

const session = (cpuHz = 600) => new EmulatorSession({ cpuHz, interpreter: { readRom } });

describe('Emulator session', () => {
  it('starts idle with the default status', () => {
    const s = session();
    expect(s.status).toBe(STATUS_DEFAULT);
    expect(s.isRunning()).toBe(false);
    expect(s.runFrame()).toBe(0);
  });

  it('loads a ROM and runs cpuHz / 60 steps per frame', () => {
    const s = session(600);
    expect(s.loadRom('count.ch8')).toEqual({ status: 'success', size: 4 });
    expect(s.status).toBe('Now running count.ch8');
    expect(s.runFrame()).toBe(10);
    expect(s.interpreter.cpu.state.v[0]).toBe(5);
  });

  it('carries fractional steps across frames', () => {
    const s = session(90);
    s.loadRom('count.ch8');
    expect([s.runFrame(), s.runFrame(), s.runFrame(), s.runFrame()]).toEqual([1, 2, 1, 2]);
  });

  it('keeps the current program when a load fails', () => {
    const s = session();
    s.loadRom('count.ch8');
    const before = s.interpreter;
    expect(s.loadRom('missing.ch8').status).toBe('rom-not-found');
    expect(s.status).toBe('ROM not found: missing.ch8');
    expect(s.interpreter).toBe(before);
    expect(s.romPath).toBe('count.ch8');
    expect(s.runFrame()).toBe(10);
  });

  it('halts on the first failed step and reports it', () => {
    const s = session();
    s.loadRom('crash.ch8');
    expect(s.runFrame()).toBe(1);
    expect(s.halt).toEqual({ status: 'stack-empty', pc: 0x202 });
    expect(s.status).toBe('Return with empty stack at 0x202');
    expect(s.runFrame()).toBe(0);
  });

  it('pauses and resumes only while a program runs', () => {
    const s = session();
    s.togglePause();
    expect(s.paused).toBe(false);
    s.loadRom('count.ch8');
    s.togglePause();
    expect(s.paused).toBe(true);
    expect(s.status).toBe(STATUS_PAUSED);
    expect(s.runFrame()).toBe(0);
    s.togglePause();
    expect(s.status).toBe('Now running count.ch8');
    expect(s.runFrame()).toBe(10);
  });

  it('reset drops the program and keeps the quirk toggles', () => {
    const s = session();
    s.loadRom('count.ch8');
    expect(s.toggleQuirk(Quirk.JumpUsesVX)).toBe(true);
    s.reset();
    expect(s.status).toBe(STATUS_DEFAULT);
    expect(s.isRunning()).toBe(false);
    expect(s.romPath).toBeNull();
    expect(s.interpreter.getQuirkFlags()).toBe(Quirk.JumpUsesVX);
  });

  it('toggles one quirk at a time on the live interpreter', () => {
    const s = session();
    s.loadRom('count.ch8');
    s.toggleQuirk(Quirk.LoadStoreIncrementsI);
    expect(s.interpreter.getQuirkFlags()).toBe(Quirk.LoadStoreIncrementsI);
    expect(s.toggleQuirk(Quirk.LoadStoreIncrementsI)).toBe(false);
    expect(s.interpreter.getQuirkFlags()).toBe(0);
    expect(s.quirks).toBe(0);
  });

  it('ticks the timers once per frame', () => {
    const s = session(600);
    s.loadRom('beep.ch8');
    s.runFrame();
    expect(s.interpreter.getSoundTimer()).toBe(0x3B);
  });

  it('routes host keys to the keypad', () => {
    const s = session();
    s.loadRom('count.ch8');
    expect(s.pressKey('v')).toBe(true);
    expect(s.interpreter.keypad.isPressed(0xF)).toBe(true);
    expect(s.releaseKey('v')).toBe(true);
    expect(s.interpreter.keypad.isPressed(0xF)).toBe(false);
    expect(s.pressKey('k')).toBe(false);
  });

  it('sends one trace line per step and keeps the sink across loads', () => {
    const lines: string[] = [];
    const s = session(120);
    s.setTraceSink((line) => { lines.push(line); });
    s.loadRom('count.ch8');
    s.runFrame();
    expect(lines.length).toBe(2);
    expect(lines[0].startsWith('200  7001  ADD V0, 0x01')).toBe(true);
    expect(lines[1].startsWith('202  1200  JP 0x200')).toBe(true);
    s.setTraceSink(null);
    s.runFrame();
    expect(lines.length).toBe(2);
  });
});
