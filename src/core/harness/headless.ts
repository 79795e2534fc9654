import { Chip8Interpreter } from '@core/system/interpreter';
import type { RandomByteFn } from '@core/cpu/cpu';
import type { QuirkFlags } from '@core/cpu/quirks';
import type { StepResult } from '@core/cpu/types';
import type { RomLoadError } from '@core/cart/rom';

export interface RunOptions {
  maxSteps: number;
  quirks?: QuirkFlags;
  // CPU steps per 60 Hz timer tick (e.g. 700 Hz -> ~12). 0 disables timers.
  stepsPerTimerTick?: number;
  random?: RandomByteFn;
}

export interface RunResult {
  steps: number;
  // 'loop': PC reached a jump to itself, the usual "program finished" idiom.
  reason: 'error' | 'loop' | 'timeout';
  result?: StepResult;
  interpreter: Chip8Interpreter;
}

export const isSelfJump = (sys: Chip8Interpreter): boolean => {
  const pc = sys.cpu.state.pc;
  if (!sys.memory.inBounds(pc, 2)) return false;
  return sys.memory.read16(pc) === (0x1000 | (pc & 0x0fff));
};

export function runProgram(bytes: Uint8Array, opts: RunOptions): RunResult | RomLoadError {
  const sys = new Chip8Interpreter(opts.quirks ?? 0, opts.random ? { random: opts.random } : {});
  const loaded = sys.loadRomBytes(bytes);
  if (loaded.status !== 'success') return loaded;

  const perTick = Math.max(0, opts.stepsPerTimerTick ?? 0);
  let steps = 0;
  while (steps < opts.maxSteps) {
    if (isSelfJump(sys)) return { steps, reason: 'loop', interpreter: sys };
    const result = sys.step();
    if (result.status !== 'success') return { steps, reason: 'error', result, interpreter: sys };
    steps++;
    if (perTick > 0 && steps % perTick === 0) sys.tickTimers();
  }
  return { steps, reason: 'timeout', interpreter: sys };
}
