import type { Address, Byte, Word } from './types';

// Opcode fields:
//   nnn = low 12 bits (address)    kk = low byte
//   x   = bits 8..11 (register)    y  = bits 4..7 (register)
//   n   = low nibble
export const opX = (op: Word): number => (op >>> 8) & 0x0f;
export const opY = (op: Word): number => (op >>> 4) & 0x0f;
export const opN = (op: Word): number => op & 0x0f;
export const opKK = (op: Word): Byte => op & 0xff;
export const opNNN = (op: Word): Address => op & 0x0fff;

export type Instruction =
  | { op: 'CLS' }
  | { op: 'RET' }
  | { op: 'JP'; nnn: Address }
  | { op: 'CALL'; nnn: Address }
  | { op: 'SE_VX_BYTE'; x: number; kk: Byte }
  | { op: 'SNE_VX_BYTE'; x: number; kk: Byte }
  | { op: 'SE_VX_VY'; x: number; y: number }
  | { op: 'LD_VX_BYTE'; x: number; kk: Byte }
  | { op: 'ADD_VX_BYTE'; x: number; kk: Byte }
  | { op: 'LD_VX_VY'; x: number; y: number }
  | { op: 'OR'; x: number; y: number }
  | { op: 'AND'; x: number; y: number }
  | { op: 'XOR'; x: number; y: number }
  | { op: 'ADD_VX_VY'; x: number; y: number }
  | { op: 'SUB'; x: number; y: number }
  | { op: 'SHR'; x: number; y: number }
  | { op: 'SUBN'; x: number; y: number }
  | { op: 'SHL'; x: number; y: number }
  | { op: 'SNE_VX_VY'; x: number; y: number }
  | { op: 'LD_I'; nnn: Address }
  | { op: 'JP_OFFSET'; x: number; nnn: Address }
  | { op: 'RND'; x: number; kk: Byte }
  | { op: 'DRW'; x: number; y: number; n: number }
  | { op: 'SKP'; x: number }
  | { op: 'SKNP'; x: number }
  | { op: 'LD_VX_DT'; x: number }
  | { op: 'LD_VX_K'; x: number }
  | { op: 'LD_DT_VX'; x: number }
  | { op: 'LD_ST_VX'; x: number }
  | { op: 'ADD_I_VX'; x: number }
  | { op: 'LD_F_VX'; x: number }
  | { op: 'LD_B_VX'; x: number }
  | { op: 'LD_MEM_VX'; x: number } // Fx55: store V0..Vx at [I]
  | { op: 'LD_VX_MEM'; x: number }; // Fx65: load V0..Vx from [I]

// Decode a 16-bit opcode. Returns null for anything that is not a CHIP-8
// instruction (including the 0nnn machine-code calls).
export function decode(opcode: Word): Instruction | null {
  const op = opcode & 0xffff;
  const x = opX(op);
  const y = opY(op);
  const n = opN(op);
  const kk = opKK(op);
  const nnn = opNNN(op);

  switch (op >>> 12) {
    case 0x0:
      if (op === 0x00e0) return { op: 'CLS' };
      if (op === 0x00ee) return { op: 'RET' };
      return null;
    case 0x1: return { op: 'JP', nnn };
    case 0x2: return { op: 'CALL', nnn };
    case 0x3: return { op: 'SE_VX_BYTE', x, kk };
    case 0x4: return { op: 'SNE_VX_BYTE', x, kk };
    case 0x5: return n === 0 ? { op: 'SE_VX_VY', x, y } : null;
    case 0x6: return { op: 'LD_VX_BYTE', x, kk };
    case 0x7: return { op: 'ADD_VX_BYTE', x, kk };
    case 0x8:
      switch (n) {
        case 0x0: return { op: 'LD_VX_VY', x, y };
        case 0x1: return { op: 'OR', x, y };
        case 0x2: return { op: 'AND', x, y };
        case 0x3: return { op: 'XOR', x, y };
        case 0x4: return { op: 'ADD_VX_VY', x, y };
        case 0x5: return { op: 'SUB', x, y };
        case 0x6: return { op: 'SHR', x, y };
        case 0x7: return { op: 'SUBN', x, y };
        case 0xe: return { op: 'SHL', x, y };
        default: return null;
      }
    case 0x9: return n === 0 ? { op: 'SNE_VX_VY', x, y } : null;
    case 0xa: return { op: 'LD_I', nnn };
    case 0xb: return { op: 'JP_OFFSET', x, nnn };
    case 0xc: return { op: 'RND', x, kk };
    case 0xd: return { op: 'DRW', x, y, n };
    case 0xe:
      if (kk === 0x9e) return { op: 'SKP', x };
      if (kk === 0xa1) return { op: 'SKNP', x };
      return null;
    case 0xf:
      switch (kk) {
        case 0x07: return { op: 'LD_VX_DT', x };
        case 0x0a: return { op: 'LD_VX_K', x };
        case 0x15: return { op: 'LD_DT_VX', x };
        case 0x18: return { op: 'LD_ST_VX', x };
        case 0x1e: return { op: 'ADD_I_VX', x };
        case 0x29: return { op: 'LD_F_VX', x };
        case 0x33: return { op: 'LD_B_VX', x };
        case 0x55: return { op: 'LD_MEM_VX', x };
        case 0x65: return { op: 'LD_VX_MEM', x };
        default: return null;
      }
    default:
      return null;
  }
}
