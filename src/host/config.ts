import { parseQuirks, type QuirkFlags } from '@core/cpu/quirks';

export const DEFAULT_CPU_HZ = 700;
export const DEFAULT_SCALE = 10;
export const DEFAULT_MAX_STEPS = 1000;
export const DEFAULT_FRAMES = 60;

export interface HostConfig {
  rom: string | null;
  cpuHz: number;
  quirks: QuirkFlags;
  scale: number;
  maxSteps: number;
  frames: number;
  out: string | null;
  trace: boolean;
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string | null { const v = env[name]; return v && v.length > 0 ? v : null }

const positiveInt = (raw: string | null, fallback: number): number => {
  if (raw === null) return fallback;
  const v = parseInt(raw, 10);
  return Number.isFinite(v) && v > 0 ? v : fallback;
};

const positiveNumber = (raw: string | null, fallback: number): number => {
  if (raw === null) return fallback;
  const v = parseFloat(raw);
  return Number.isFinite(v) && v > 0 ? v : fallback;
};

// Environment first, then --key=value arguments; a bare argument is the ROM path.
// Throws on an unknown quirk name.
export function parseConfig(argv: string[] = process.argv.slice(2), env: Env = process.env): HostConfig {
  let rom = getEnv(env, 'ROM');
  let hz = getEnv(env, 'CHIP8_CPU_HZ');
  let quirks = getEnv(env, 'CHIP8_QUIRKS') ?? '';
  let scale = getEnv(env, 'CHIP8_SCALE');
  let max = getEnv(env, 'TRACE_MAX');
  let frames = getEnv(env, 'CHIP8_FRAMES');
  let out = getEnv(env, 'CHIP8_OUT');
  let trace = getEnv(env, 'TRACE_CHIP8') === '1';
  for (const a of argv) {
    if (a.startsWith('--rom=')) rom = a.slice(6);
    else if (a.startsWith('--hz=')) hz = a.slice(5);
    else if (a.startsWith('--quirks=')) quirks = a.slice(9);
    else if (a.startsWith('--scale=')) scale = a.slice(8);
    else if (a.startsWith('--max=')) max = a.slice(6);
    else if (a.startsWith('--frames=')) frames = a.slice(9);
    else if (a.startsWith('--out=')) out = a.slice(6);
    else if (a === '--trace') trace = true;
    else if (!a.startsWith('--')) rom = a;
  }
  return {
    rom,
    cpuHz: positiveNumber(hz, DEFAULT_CPU_HZ),
    quirks: parseQuirks(quirks),
    scale: positiveInt(scale, DEFAULT_SCALE),
    maxSteps: positiveInt(max, DEFAULT_MAX_STEPS),
    frames: positiveInt(frames, DEFAULT_FRAMES),
    out,
    trace,
  };
}
