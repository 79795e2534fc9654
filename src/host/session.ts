import { Chip8Interpreter, type InterpreterOptions } from '@core/system/interpreter';
import type { QuirkFlag, QuirkFlags } from '@core/cpu/quirks';
import type { StepResult } from '@core/cpu/types';
import type { RomLoadResult } from '@core/cart/rom';
import { TIMER_HZ } from '@core/timers/timers';
import { formatTraceLine } from '@utils/disasmChip8';
import { DEFAULT_CPU_HZ } from '@host/config';
import { chip8KeyFor } from '@host/keymap';
import { describeRomLoadResult, describeStepResult } from '@host/status';

export const STATUS_DEFAULT = 'Please select a ROM file.';
export const STATUS_PAUSED = 'Paused.';
export const statusRunning = (path: string): string => `Now running ${path}`;

export interface SessionOptions {
  cpuHz?: number;
  quirks?: QuirkFlags;
  interpreter?: InterpreterOptions;
}

// Host-side state around one interpreter: which ROM is loaded, pause/halt,
// the quirk toggles and the status line. Reset and load swap in a fresh
// interpreter built with the current quirks.
export class EmulatorSession {
  interpreter: Chip8Interpreter;
  romPath: string | null = null;
  paused = false;
  // First failed step; stepping stops until the next load or reset.
  halt: StepResult | null = null;
  status = STATUS_DEFAULT;
  quirks: QuirkFlags;
  readonly cpuHz: number;
  private stepCarry = 0;
  private traceSink: ((line: string) => void) | null = null;

  constructor(private readonly opts: SessionOptions = {}) {
    this.cpuHz = opts.cpuHz && opts.cpuHz > 0 ? opts.cpuHz : DEFAULT_CPU_HZ;
    this.quirks = opts.quirks ?? 0;
    this.interpreter = this.createInterpreter();
  }

  private createInterpreter(): Chip8Interpreter {
    const sys = new Chip8Interpreter(this.quirks, this.opts.interpreter);
    if (this.traceSink) this.attachTrace(sys, this.traceSink);
    return sys;
  }

  private attachTrace(sys: Chip8Interpreter, sink: (line: string) => void): void {
    sys.cpu.setTraceHook((pc, opcode) => {
      const s = sys.cpu.state;
      sink(formatTraceLine(pc, opcode, { v: s.v, i: s.i, sp: s.stack.length, dt: sys.timers.delay, st: sys.timers.sound }));
    });
  }

  setTraceSink(sink: ((line: string) => void) | null): void {
    this.traceSink = sink;
    if (sink) this.attachTrace(this.interpreter, sink);
    else this.interpreter.cpu.setTraceHook(null);
  }

  isRunning(): boolean {
    return this.interpreter.isRunning();
  }

  // Loads into a fresh interpreter; the current one keeps running if the load fails.
  loadRom(path: string): RomLoadResult {
    const next = this.createInterpreter();
    const result = next.loadRom(path);
    if (result.status !== 'success') {
      this.status = describeRomLoadResult(result);
      return result;
    }
    this.interpreter = next;
    this.romPath = path;
    this.paused = false;
    this.halt = null;
    this.stepCarry = 0;
    this.status = statusRunning(path);
    return result;
  }

  reset(): void {
    this.interpreter = this.createInterpreter();
    this.romPath = null;
    this.paused = false;
    this.halt = null;
    this.stepCarry = 0;
    this.status = STATUS_DEFAULT;
  }

  togglePause(): void {
    if (!this.interpreter.isRunning() || this.halt || this.romPath === null) return;
    this.paused = !this.paused;
    this.status = this.paused ? STATUS_PAUSED : statusRunning(this.romPath);
  }

  // Flips one quirk for this session and for the live interpreter. Returns the new setting.
  toggleQuirk(flag: QuirkFlag): boolean {
    this.quirks ^= flag;
    const on = (this.quirks & flag) !== 0;
    if (on) this.interpreter.setQuirkFlag(flag);
    else this.interpreter.clearQuirkFlag(flag);
    return on;
  }

  // One 60 Hz frame: cpuHz / 60 steps (fractions carried over), then one timer
  // tick. Returns the number of instructions executed.
  runFrame(): number {
    if (this.paused || this.halt || !this.interpreter.isRunning()) return 0;
    const budget = this.cpuHz / TIMER_HZ + this.stepCarry;
    const steps = Math.floor(budget);
    this.stepCarry = budget - steps;
    let executed = 0;
    for (; executed < steps; executed++) {
      const result = this.interpreter.step();
      if (result.status !== 'success') {
        this.halt = result;
        this.status = describeStepResult(result);
        return executed;
      }
    }
    this.interpreter.tickTimers();
    return executed;
  }

  pressKey(name: string): boolean {
    return this.setKey(name, true);
  }

  releaseKey(name: string): boolean {
    return this.setKey(name, false);
  }

  private setKey(name: string, down: boolean): boolean {
    const key = chip8KeyFor(name);
    if (key === undefined) return false;
    this.interpreter.setKeyValue(key, down);
    return true;
  }
}
