#!/usr/bin/env tsx
/* eslint-disable no-console */
import { readRomFile } from '@core/cart/rom'
import { runProgram } from '@core/harness/headless'
import { parseConfig } from '@host/config'
import { describeRomLoadResult, describeStepResult } from '@host/status'
import { renderFrame } from '@host/terminal/render'

// Headless run to a self-jump, an error or the step limit. Prints the final
// frame as text, then a JSON summary line.
async function main() {
  const args = parseConfig()
  if (!args.rom) { console.error('Usage: tsx scripts/run-rom.ts <rom.ch8> [--max=1000] [--hz=700]'); process.exit(2) }
  const read = readRomFile(args.rom)
  if (read.status !== 'success') { console.error(describeRomLoadResult(read)); process.exit(2) }

  const run = runProgram(read.bytes, {
    maxSteps: args.maxSteps,
    quirks: args.quirks,
    stepsPerTimerTick: Math.max(1, Math.round(args.cpuHz / 60)),
  })
  if (!('reason' in run)) { console.error(describeRomLoadResult(run)); process.exit(2) }
  const s = run.interpreter.cpu.state
  for (const line of renderFrame(run.interpreter.getGraphics())) console.log(line)
  console.log(JSON.stringify({
    rom: args.rom,
    steps: run.steps,
    reason: run.reason,
    message: run.result ? describeStepResult(run.result) : null,
    pc: s.pc,
    i: s.i,
    v: Array.from(s.v),
  }))
  process.exit(run.reason === 'error' ? 1 : 0)
}

main().catch((e) => { console.error(e); process.exit(1) })
