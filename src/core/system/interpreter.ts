import { Memory, PROGRAM_START } from '@core/bus/memory';
import { CPU, defaultRandomByte, type RandomByteFn } from '@core/cpu/cpu';
import type { Address, Byte, StepResult } from '@core/cpu/types';
import type { QuirkFlag, QuirkFlags } from '@core/cpu/quirks';
import { Display } from '@core/display/display';
import { Keypad } from '@core/input/keypad';
import { Timers } from '@core/timers/timers';
import { checkRomSize, readRomFile, type RomLoadResult, type RomReader } from '@core/cart/rom';

export interface InterpreterOptions {
  // Source for Cxkk; must return 0..255.
  random?: RandomByteFn;
  // How loadRom(path) gets its bytes. Defaults to the file system.
  readRom?: RomReader;
}

const EMPTY: StepResult = { status: 'empty' };

// One CHIP-8 machine. Owned by a single host, which drives step() at its CPU
// rate and tickTimers() at 60 Hz; nothing here is shared between instances.
export class Chip8Interpreter {
  public readonly memory = new Memory();
  public readonly display = new Display();
  public readonly keypad = new Keypad();
  public readonly timers = new Timers();
  public readonly cpu: CPU;
  private running = false;
  private readonly readRom: RomReader;

  constructor(quirks: QuirkFlags = 0, options: InterpreterOptions = {}) {
    this.cpu = new CPU(
      { memory: this.memory, display: this.display, keypad: this.keypad, timers: this.timers },
      quirks,
      options.random ?? defaultRandomByte,
    );
    this.readRom = options.readRom ?? readRomFile;
  }

  // Back to the freshly constructed state: no ROM, nothing running.
  reset(quirks: QuirkFlags = this.cpu.quirks): void {
    this.initMachine();
    this.keypad.releaseAll();
    this.cpu.quirks = quirks;
    this.running = false;
  }

  private initMachine(): void {
    this.memory.reset();
    this.display.clear();
    this.timers.reset();
    this.cpu.reset(PROGRAM_START);
  }

  loadRom(path: string): RomLoadResult {
    const read = this.readRom(path);
    if (read.status !== 'success') return read;
    return this.loadRomBytes(read.bytes);
  }

  // Validates first; a rejected image leaves the current machine untouched.
  loadRomBytes(bytes: Uint8Array): RomLoadResult {
    const tooLarge = checkRomSize(bytes.length);
    if (tooLarge) return tooLarge;
    this.initMachine();
    this.memory.loadProgram(bytes);
    this.running = true;
    return { status: 'success', size: bytes.length };
  }

  step(): StepResult {
    if (!this.running) return EMPTY;
    return this.cpu.step();
  }

  // 60 Hz clock.
  tickTimers(): void {
    this.timers.tick();
  }

  setKeyValue(key: number, pressed: boolean): void {
    this.keypad.setKey(key, pressed);
  }

  getGraphics(): readonly boolean[] {
    return this.display.getPixels();
  }

  getDelayTimer(): Byte { return this.timers.delay; }
  getSoundTimer(): Byte { return this.timers.sound; }

  setQuirkFlag(flag: QuirkFlag): void { this.cpu.quirks |= flag; }
  clearQuirkFlag(flag: QuirkFlag): void { this.cpu.quirks &= ~flag; }
  hasQuirk(flag: QuirkFlag): boolean { return (this.cpu.quirks & flag) !== 0; }
  getQuirkFlags(): QuirkFlags { return this.cpu.quirks; }

  isRunning(): boolean { return this.running; }

  peek(addr: Address): Byte {
    return this.memory.read(addr);
  }
}
