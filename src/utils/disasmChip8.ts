import type { Byte, Word } from "@core/cpu/types";
import { decode, type Instruction } from "@core/cpu/decode";

export function hex2(v: number): string { return (v & 0xFF).toString(16).toUpperCase().padStart(2, "0"); }
export function hex3(v: number): string { return v.toString(16).toUpperCase().padStart(3, "0"); }
export function hex4(v: number): string { return (v & 0xFFFF).toString(16).toUpperCase().padStart(4, "0"); }

export interface DisasmResult {
  opcode: Word;
  mnemonic: string;
  operand: string;
}

const reg = (r: number) => "V" + r.toString(16).toUpperCase();
const imm = (kk: Byte) => "0x" + hex2(kk);
const addr = (nnn: number) => "0x" + hex3(nnn);

function format(ins: Instruction): [string, string] {
  switch (ins.op) {
    case "CLS": return ["CLS", ""];
    case "RET": return ["RET", ""];
    case "JP": return ["JP", addr(ins.nnn)];
    case "CALL": return ["CALL", addr(ins.nnn)];
    case "SE_VX_BYTE": return ["SE", `${reg(ins.x)}, ${imm(ins.kk)}`];
    case "SNE_VX_BYTE": return ["SNE", `${reg(ins.x)}, ${imm(ins.kk)}`];
    case "SE_VX_VY": return ["SE", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "SNE_VX_VY": return ["SNE", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "LD_VX_BYTE": return ["LD", `${reg(ins.x)}, ${imm(ins.kk)}`];
    case "ADD_VX_BYTE": return ["ADD", `${reg(ins.x)}, ${imm(ins.kk)}`];
    case "LD_VX_VY": return ["LD", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "OR": return ["OR", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "AND": return ["AND", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "XOR": return ["XOR", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "ADD_VX_VY": return ["ADD", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "SUB": return ["SUB", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "SUBN": return ["SUBN", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "SHR": return ["SHR", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "SHL": return ["SHL", `${reg(ins.x)}, ${reg(ins.y)}`];
    case "LD_I": return ["LD", `I, ${addr(ins.nnn)}`];
    case "JP_OFFSET": return ["JP", `V0, ${addr(ins.nnn)}`];
    case "RND": return ["RND", `${reg(ins.x)}, ${imm(ins.kk)}`];
    case "DRW": return ["DRW", `${reg(ins.x)}, ${reg(ins.y)}, ${ins.n}`];
    case "SKP": return ["SKP", reg(ins.x)];
    case "SKNP": return ["SKNP", reg(ins.x)];
    case "LD_VX_DT": return ["LD", `${reg(ins.x)}, DT`];
    case "LD_VX_K": return ["LD", `${reg(ins.x)}, K`];
    case "LD_DT_VX": return ["LD", `DT, ${reg(ins.x)}`];
    case "LD_ST_VX": return ["LD", `ST, ${reg(ins.x)}`];
    case "ADD_I_VX": return ["ADD", `I, ${reg(ins.x)}`];
    case "LD_F_VX": return ["LD", `F, ${reg(ins.x)}`];
    case "LD_B_VX": return ["LD", `B, ${reg(ins.x)}`];
    case "LD_MEM_VX": return ["LD", `[I], ${reg(ins.x)}`];
    case "LD_VX_MEM": return ["LD", `${reg(ins.x)}, [I]`];
  }
}

export function disassemble(opcode: Word): DisasmResult {
  const op = opcode & 0xFFFF;
  const ins = decode(op);
  if (!ins) return { opcode: op, mnemonic: "???", operand: "" };
  const [mnemonic, operand] = format(ins);
  return { opcode: op, mnemonic, operand };
}

export const disasmText = (res: DisasmResult): string => (res.mnemonic + (res.operand ? " " + res.operand : "")).trim();

export interface TraceRegs {
  v: ArrayLike<Byte>;
  i: Word;
  sp: number;
  dt: Byte;
  st: Byte;
}

// "0200  6A2A  LD VA, 0x2A            V:00 .. 00 I:000 SP:0 DT:00 ST:00"
export function formatTraceLine(pc: Word, opcode: Word, regs: TraceRegs): string {
  const left = `${hex3(pc)}  ${hex4(opcode)}  ${disasmText(disassemble(opcode))}`;
  const regCol = 34;
  const pad = left.length < regCol ? " ".repeat(regCol - left.length) : " ";
  const vs = Array.from(regs.v, (b) => hex2(b)).join(" ");
  return `${left}${pad}V:${vs} I:${hex3(regs.i)} SP:${regs.sp} DT:${hex2(regs.dt)} ST:${hex2(regs.st)}`;
}
