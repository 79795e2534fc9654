#!/usr/bin/env tsx
/* eslint-disable no-console */
import { Quirk, QUIRK_LABELS, type QuirkFlag } from '@core/cpu/quirks'
import { TIMER_HZ } from '@core/timers/timers'
import { parseConfig } from '@host/config'
import { appActionFor, type AppAction } from '@host/keymap'
import { EmulatorSession } from '@host/session'
import { renderFrame } from '@host/terminal/render'
import { parseKeyNames } from '@host/terminal/keys'

// Terminals report key presses but not releases; a key counts as held until
// this long after its last repeat.
const KEY_HOLD_MS = 150

const CSI = '\u001b['
const HIDE_CURSOR = `${CSI}?25l`
const SHOW_CURSOR = `${CSI}?25h`
const CLEAR = `${CSI}2J`
const HOME = `${CSI}H`
const BELL = '\u0007'

function usage(): never {
  console.error('Usage: tsx src/host/terminal/main.ts <rom.ch8> [--hz=700] [--quirks=shift-vy,bnnn-vx,fx-i] [--trace]')
  process.exit(2)
}

async function main() {
  const config = parseConfig()
  if (!config.rom) usage()
  const rom = config.rom

  const session = new EmulatorSession({ cpuHz: config.cpuHz, quirks: config.quirks })
  if (config.trace) session.setTraceSink((line) => { process.stderr.write(line + '\n') })
  const loaded = session.loadRom(rom)
  if (loaded.status !== 'success') {
    console.error(session.status)
    process.exit(1)
  }

  const stdin = process.stdin
  const stdout = process.stdout
  const held = new Map<string, NodeJS.Timeout>()
  let lastVersion = -1
  let lastStatus = ''
  let lastSound = 0

  const quirkLine = (): string => {
    const flags: QuirkFlag[] = [Quirk.ShiftUsesVY, Quirk.JumpUsesVX, Quirk.LoadStoreIncrementsI]
    return flags.map((f, n) => `F${n + 1} ${QUIRK_LABELS[f]}: ${(session.quirks & f) !== 0 ? 'on' : 'off'}`).join('  ')
  }

  const draw = (force = false) => {
    const version = session.interpreter.display.getVersion()
    const statusText = `${session.status}\n${quirkLine()}`
    if (!force && version === lastVersion && statusText === lastStatus) return
    lastVersion = version
    lastStatus = statusText
    const frame = renderFrame(session.interpreter.getGraphics())
    stdout.write(HOME + frame.join('\n') + '\n\n' + statusText + `${CSI}K\n` + 'p pause  F5 reset  Esc quit' + `${CSI}K`)
  }

  const releaseAll = () => {
    for (const [name, timer] of held) { clearTimeout(timer); session.releaseKey(name) }
    held.clear()
  }

  let interval: NodeJS.Timeout | null = null
  const quit = () => {
    if (interval) clearInterval(interval)
    releaseAll()
    if (stdin.isTTY) stdin.setRawMode(false)
    stdin.pause()
    stdout.write(SHOW_CURSOR + '\n')
    process.exit(0)
  }

  const actions: Record<AppAction, () => void> = {
    pause: () => session.togglePause(),
    quit,
    reset: () => {
      releaseAll()
      session.reset()
      const again = session.loadRom(rom)
      if (again.status !== 'success') console.error(session.status)
    },
    'quirk-shift': () => { session.toggleQuirk(Quirk.ShiftUsesVY) },
    'quirk-jump': () => { session.toggleQuirk(Quirk.JumpUsesVX) },
    'quirk-loadstore': () => { session.toggleQuirk(Quirk.LoadStoreIncrementsI) },
  }

  const onKey = (name: string) => {
    const action = appActionFor(name)
    if (action) { actions[action](); draw(true); return }
    if (!session.pressKey(name)) return
    const prev = held.get(name)
    if (prev) clearTimeout(prev)
    held.set(name, setTimeout(() => { held.delete(name); session.releaseKey(name) }, KEY_HOLD_MS))
  }

  if (stdin.isTTY) stdin.setRawMode(true)
  stdin.setEncoding('utf8')
  stdin.on('data', (chunk: string) => { for (const name of parseKeyNames(chunk)) onKey(name) })
  stdin.resume()

  stdout.write(HIDE_CURSOR + CLEAR)
  draw(true)
  interval = setInterval(() => {
    session.runFrame()
    const sound = session.interpreter.getSoundTimer()
    if (sound > 0 && lastSound === 0) stdout.write(BELL)
    lastSound = sound
    draw()
  }, 1000 / TIMER_HZ)
}

main().catch((e) => { process.stdout.write(SHOW_CURSOR); console.error(e); process.exit(1) })
