// Compatibility toggles for the instructions that historical interpreters
// disagree on. Combined into one bitset owned by the interpreter.
export const Quirk = {
  // 8xy6/8xyE shift Vy into Vx instead of shifting Vx in place.
  ShiftUsesVY: 1 << 0,
  // Bxnn jumps to xnn + Vx instead of nnn + V0.
  JumpUsesVX: 1 << 1,
  // Fx55/Fx65 leave I pointing past the last register transferred.
  LoadStoreIncrementsI: 1 << 2,
} as const;

export type QuirkFlag = (typeof Quirk)[keyof typeof Quirk];
export type QuirkFlags = number;

export const ALL_QUIRKS: QuirkFlags = Quirk.ShiftUsesVY | Quirk.JumpUsesVX | Quirk.LoadStoreIncrementsI;

// Short names used by configuration (env vars, CLI flags).
export const QUIRK_NAMES: ReadonlyMap<string, QuirkFlag> = new Map<string, QuirkFlag>([
  ['shift-vy', Quirk.ShiftUsesVY],
  ['bnnn-vx', Quirk.JumpUsesVX],
  ['fx-i', Quirk.LoadStoreIncrementsI],
]);

export const QUIRK_LABELS: Record<QuirkFlag, string> = {
  [Quirk.ShiftUsesVY]: 'Shifts use VY',
  [Quirk.JumpUsesVX]: 'BNNN uses VX',
  [Quirk.LoadStoreIncrementsI]: 'FX changes I',
};

export function hasQuirk(flags: QuirkFlags, flag: QuirkFlag): boolean {
  return (flags & flag) !== 0;
}

// "shift-vy,fx-i" -> bitset. Throws on names it does not know.
export function parseQuirks(list: string): QuirkFlags {
  let flags = 0;
  for (const raw of list.split(',')) {
    const name = raw.trim().toLowerCase();
    if (!name) continue;
    if (name === 'all') { flags |= ALL_QUIRKS; continue; }
    const flag = QUIRK_NAMES.get(name);
    if (flag === undefined) throw new Error(`Unknown quirk "${raw.trim()}" (expected one of: ${[...QUIRK_NAMES.keys()].join(', ')}, all)`);
    flags |= flag;
  }
  return flags;
}
