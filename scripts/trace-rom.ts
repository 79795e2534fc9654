#!/usr/bin/env tsx
/* eslint-disable no-console */
import { Chip8Interpreter } from '@core/system/interpreter'
import { readRomFile } from '@core/cart/rom'
import { formatTraceLine } from '@utils/disasmChip8'
import { parseConfig } from '@host/config'
import { describeRomLoadResult, describeStepResult } from '@host/status'

// One trace line per executed instruction, state as it was before the instruction ran.
async function main() {
  const args = parseConfig()
  if (!args.rom) { console.error('Usage: tsx scripts/trace-rom.ts <rom.ch8> [--max=1000] [--quirks=...]'); process.exit(2) }
  const read = readRomFile(args.rom)
  if (read.status !== 'success') { console.error(describeRomLoadResult(read)); process.exit(2) }

  const sys = new Chip8Interpreter(args.quirks)
  const loaded = sys.loadRomBytes(read.bytes)
  if (loaded.status !== 'success') { console.error(describeRomLoadResult(loaded)); process.exit(2) }
  sys.cpu.setTraceHook((pc, opcode) => {
    const s = sys.cpu.state
    console.log(formatTraceLine(pc, opcode, { v: s.v, i: s.i, sp: s.stack.length, dt: sys.getDelayTimer(), st: sys.getSoundTimer() }))
  })

  const perTick = Math.max(1, Math.round(args.cpuHz / 60))
  for (let n = 1; n <= args.maxSteps; n++) {
    const result = sys.step()
    if (result.status !== 'success') {
      console.error(describeStepResult(result))
      process.exit(1)
    }
    if (n % perTick === 0) sys.tickTimers()
  }
}

main().catch((e) => { console.error(e); process.exit(1) })
