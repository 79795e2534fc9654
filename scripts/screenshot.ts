#!/usr/bin/env tsx
/* eslint-disable no-console */
import path from 'node:path'
import { parseConfig } from '@host/config'
import { EmulatorSession } from '@host/session'
import { framebufferToPng, writePng } from '@host/png'

async function main() {
  const args = parseConfig()
  if (!args.rom) { console.error('Usage: tsx scripts/screenshot.ts <rom.ch8> [--frames=60] [--scale=10] [--out=file.png]'); process.exit(2) }
  const session = new EmulatorSession({ cpuHz: args.cpuHz, quirks: args.quirks })
  const loaded = session.loadRom(args.rom)
  if (loaded.status !== 'success') { console.error(session.status); process.exit(2) }

  let frames = 0
  while (frames < args.frames && !session.halt) { session.runFrame(); frames++ }
  if (session.halt) console.warn(`Stopped after ${frames} frames: ${session.status}`)

  const out = args.out ?? path.join('screenshots', path.basename(args.rom).replace(/\.[^.]*$/, '') + '.png')
  await writePng(out, framebufferToPng(session.interpreter.getGraphics(), { scale: args.scale }))
  console.log(`Wrote ${out}`)
}

main().catch((e) => { console.error(e); process.exit(1) })
