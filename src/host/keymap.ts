// Physical keys -> CHIP-8 keypad, laid out as the usual 4x4 block:
//   1 2 3 4      1 2 3 C
//   q w e r  ->  4 5 6 D
//   a s d f      7 8 9 E
//   z x c v      A 0 B F
// y doubles as z for QWERTZ keyboards.
export const CHIP8_KEYMAP: ReadonlyMap<string, number> = new Map<string, number>([
  ['1', 0x1], ['2', 0x2], ['3', 0x3], ['4', 0xC],
  ['q', 0x4], ['w', 0x5], ['e', 0x6], ['r', 0xD],
  ['a', 0x7], ['s', 0x8], ['d', 0x9], ['f', 0xE],
  ['z', 0xA], ['x', 0x0], ['c', 0xB], ['v', 0xF],
  ['y', 0xA],
]);

export type AppAction = 'pause' | 'quit' | 'reset' | 'quirk-shift' | 'quirk-jump' | 'quirk-loadstore';

export const APP_KEYMAP: ReadonlyMap<string, AppAction> = new Map<string, AppAction>([
  ['p', 'pause'],
  ['escape', 'quit'],
  ['ctrl-c', 'quit'],
  ['f1', 'quirk-shift'],
  ['f2', 'quirk-jump'],
  ['f3', 'quirk-loadstore'],
  ['f5', 'reset'],
]);

export const chip8KeyFor = (name: string): number | undefined => CHIP8_KEYMAP.get(name.toLowerCase());
export const appActionFor = (name: string): AppAction | undefined => APP_KEYMAP.get(name.toLowerCase());
