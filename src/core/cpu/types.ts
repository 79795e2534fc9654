export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Address = number; // 0x000..0xFFF

export interface CPUState {
  v: Uint8Array; // V0..VF, VF doubles as the flag register
  i: Word; // index register
  pc: Word; // program counter
  stack: Word[]; // return addresses, length is SP
}

// Outcome of a single step. Anything other than 'success' leaves PC on the
// instruction that produced it.
export type StepResult =
  | { status: 'success' }
  | { status: 'empty' } // no ROM loaded
  | { status: 'invalid-opcode'; opcode: Word; pc: Word }
  | { status: 'stack-overflow'; pc: Word }
  | { status: 'stack-empty'; pc: Word }
  | { status: 'memory-out-of-bounds'; pc: Word; address: number };
