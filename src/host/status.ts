import type { StepResult } from '@core/cpu/types';
import type { RomLoadResult } from '@core/cart/rom';
import { hex3, hex4 } from '@utils/disasmChip8';

const at = (pc: number) => `0x${hex3(pc)}`;

export function describeStepResult(result: StepResult): string {
  switch (result.status) {
    case 'success': return 'OK';
    case 'empty': return 'No ROM loaded.';
    case 'invalid-opcode': return `Invalid opcode 0x${hex4(result.opcode)} at ${at(result.pc)}`;
    case 'stack-overflow': return `Stack overflow at ${at(result.pc)}`;
    case 'stack-empty': return `Return with empty stack at ${at(result.pc)}`;
    case 'memory-out-of-bounds': return `Memory access out of bounds (${at(result.address)}) at ${at(result.pc)}`;
  }
}

export function describeRomLoadResult(result: RomLoadResult): string {
  switch (result.status) {
    case 'success': return `Loaded ${result.size} bytes`;
    case 'rom-not-found': return `ROM not found: ${result.path}`;
    case 'rom-open-failed': return `Could not open ROM ${result.path}: ${result.message}`;
    case 'rom-read-failed': return `Could not read ROM ${result.path}: ${result.message}`;
    case 'rom-exceeds-memory': return `ROM is ${result.size} bytes; at most ${result.limit} fit in memory`;
  }
}
