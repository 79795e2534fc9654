import type { Byte, CPUState, StepResult, Word } from './types';
import { decode, type Instruction } from './decode';
import { Quirk, hasQuirk, type QuirkFlags } from './quirks';
import { Memory, fontAddress } from '@core/bus/memory';
import { Display } from '@core/display/display';
import { Keypad } from '@core/input/keypad';
import { Timers } from '@core/timers/timers';

export const STACK_SIZE = 16;
export const VF = 0xf;

export type RandomByteFn = () => Byte;

export const defaultRandomByte: RandomByteFn = () => Math.floor(Math.random() * 256) & 0xff;

const SUCCESS: StepResult = { status: 'success' };

export interface CPUDevices {
  memory: Memory;
  display: Display;
  keypad: Keypad;
  timers: Timers;
}

export class CPU {
  state: CPUState;
  // Read on every step, so changes apply from the next instruction on.
  quirks: QuirkFlags;
  private random: RandomByteFn;
  // optional per-instruction trace hook (called after fetch, before execute)
  private traceHook: ((pc: Word, opcode: Word) => void) | null = null;

  constructor(private devices: CPUDevices, quirks: QuirkFlags = 0, random: RandomByteFn = defaultRandomByte) {
    this.state = CPU.initialState(0x200);
    this.quirks = quirks;
    this.random = random;
  }

  private static initialState(pc: Word): CPUState {
    return { v: new Uint8Array(16), i: 0, pc, stack: [] };
  }

  reset(pc: Word): void {
    this.state = CPU.initialState(pc & 0xffff);
  }

  setTraceHook(fn: ((pc: Word, opcode: Word) => void) | null): void { this.traceHook = fn; }

  // Fetch, decode and execute one instruction. On any non-success result PC is
  // left on the instruction and no other state has changed.
  step(): StepResult {
    const pc = this.state.pc;
    const { memory } = this.devices;
    if (!memory.inBounds(pc, 2)) return { status: 'memory-out-of-bounds', pc, address: pc };
    const opcode = memory.read16(pc);
    if (this.traceHook) this.traceHook(pc, opcode);

    const ins = decode(opcode);
    if (!ins) return { status: 'invalid-opcode', opcode, pc };

    this.state.pc = (pc + 2) & 0xffff;
    const result = this.execute(ins, pc);
    if (result.status !== 'success') this.state.pc = pc;
    return result;
  }

  private skip(): void {
    this.state.pc = (this.state.pc + 2) & 0xffff;
  }

  private execute(ins: Instruction, pc: Word): StepResult {
    const { memory, display, keypad, timers } = this.devices;
    const s = this.state;
    const v = s.v;

    switch (ins.op) {
      case 'CLS':
        display.clear();
        return SUCCESS;
      case 'RET': {
        const ret = s.stack.pop();
        if (ret === undefined) return { status: 'stack-empty', pc };
        s.pc = ret;
        return SUCCESS;
      }
      case 'JP':
        s.pc = ins.nnn;
        return SUCCESS;
      case 'CALL':
        if (s.stack.length >= STACK_SIZE) return { status: 'stack-overflow', pc };
        s.stack.push(s.pc);
        s.pc = ins.nnn;
        return SUCCESS;
      case 'SE_VX_BYTE':
        if (v[ins.x] === ins.kk) this.skip();
        return SUCCESS;
      case 'SNE_VX_BYTE':
        if (v[ins.x] !== ins.kk) this.skip();
        return SUCCESS;
      case 'SE_VX_VY':
        if (v[ins.x] === v[ins.y]) this.skip();
        return SUCCESS;
      case 'SNE_VX_VY':
        if (v[ins.x] !== v[ins.y]) this.skip();
        return SUCCESS;
      case 'LD_VX_BYTE':
        v[ins.x] = ins.kk;
        return SUCCESS;
      case 'ADD_VX_BYTE':
        // no carry flag for the immediate form
        v[ins.x] = (v[ins.x] + ins.kk) & 0xff;
        return SUCCESS;
      case 'LD_VX_VY':
        v[ins.x] = v[ins.y];
        return SUCCESS;
      case 'OR':
        v[ins.x] |= v[ins.y];
        return SUCCESS;
      case 'AND':
        v[ins.x] &= v[ins.y];
        return SUCCESS;
      case 'XOR':
        v[ins.x] ^= v[ins.y];
        return SUCCESS;

      // Arithmetic and shifts: the flag is computed from the operands first and
      // written to VF last, so VF as an operand or destination ends up holding
      // the flag.
      case 'ADD_VX_VY': {
        const sum = v[ins.x] + v[ins.y];
        v[ins.x] = sum & 0xff;
        v[VF] = sum > 0xff ? 1 : 0;
        return SUCCESS;
      }
      case 'SUB': {
        const a = v[ins.x], b = v[ins.y];
        v[ins.x] = (a - b) & 0xff;
        v[VF] = a >= b ? 1 : 0;
        return SUCCESS;
      }
      case 'SUBN': {
        const a = v[ins.x], b = v[ins.y];
        v[ins.x] = (b - a) & 0xff;
        v[VF] = b >= a ? 1 : 0;
        return SUCCESS;
      }
      case 'SHR': {
        const src = hasQuirk(this.quirks, Quirk.ShiftUsesVY) ? v[ins.y] : v[ins.x];
        v[ins.x] = src >>> 1;
        v[VF] = src & 0x01;
        return SUCCESS;
      }
      case 'SHL': {
        const src = hasQuirk(this.quirks, Quirk.ShiftUsesVY) ? v[ins.y] : v[ins.x];
        v[ins.x] = (src << 1) & 0xff;
        v[VF] = (src >>> 7) & 0x01;
        return SUCCESS;
      }

      case 'LD_I':
        s.i = ins.nnn;
        return SUCCESS;
      case 'JP_OFFSET': {
        const reg = hasQuirk(this.quirks, Quirk.JumpUsesVX) ? ins.x : 0;
        s.pc = (ins.nnn + v[reg]) & 0x0fff;
        return SUCCESS;
      }
      case 'RND':
        v[ins.x] = this.random() & ins.kk;
        return SUCCESS;
      case 'DRW': {
        if (!memory.inBounds(s.i, ins.n)) return { status: 'memory-out-of-bounds', pc, address: s.i };
        const collision = display.drawSprite(v[ins.x], v[ins.y], memory.slice(s.i, ins.n));
        v[VF] = collision ? 1 : 0;
        return SUCCESS;
      }

      case 'SKP':
        if (keypad.isPressed(v[ins.x] & 0x0f)) this.skip();
        return SUCCESS;
      case 'SKNP':
        if (!keypad.isPressed(v[ins.x] & 0x0f)) this.skip();
        return SUCCESS;
      case 'LD_VX_K': {
        const key = keypad.firstPressed();
        // Nothing held: stay on this instruction so it runs again next step.
        if (key === null) s.pc = pc;
        else v[ins.x] = key;
        return SUCCESS;
      }

      case 'LD_VX_DT':
        v[ins.x] = timers.delay;
        return SUCCESS;
      case 'LD_DT_VX':
        timers.setDelay(v[ins.x]);
        return SUCCESS;
      case 'LD_ST_VX':
        timers.setSound(v[ins.x]);
        return SUCCESS;

      case 'ADD_I_VX':
        s.i = (s.i + v[ins.x]) & 0x0fff;
        return SUCCESS;
      case 'LD_F_VX':
        s.i = fontAddress(v[ins.x]);
        return SUCCESS;
      case 'LD_B_VX': {
        if (!memory.inBounds(s.i, 3)) return { status: 'memory-out-of-bounds', pc, address: s.i };
        const value = v[ins.x];
        memory.write(s.i, Math.floor(value / 100));
        memory.write(s.i + 1, Math.floor(value / 10) % 10);
        memory.write(s.i + 2, value % 10);
        return SUCCESS;
      }
      case 'LD_MEM_VX': {
        const count = ins.x + 1;
        if (!memory.inBounds(s.i, count)) return { status: 'memory-out-of-bounds', pc, address: s.i };
        for (let r = 0; r < count; r++) memory.write(s.i + r, v[r]);
        if (hasQuirk(this.quirks, Quirk.LoadStoreIncrementsI)) s.i = (s.i + count) & 0xffff;
        return SUCCESS;
      }
      case 'LD_VX_MEM': {
        const count = ins.x + 1;
        if (!memory.inBounds(s.i, count)) return { status: 'memory-out-of-bounds', pc, address: s.i };
        for (let r = 0; r < count; r++) v[r] = memory.read(s.i + r);
        if (hasQuirk(this.quirks, Quirk.LoadStoreIncrementsI)) s.i = (s.i + count) & 0xffff;
        return SUCCESS;
      }
    }
  }
}
