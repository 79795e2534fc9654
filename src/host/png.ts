import fs from 'node:fs'
import path from 'node:path'
import { PNG } from 'pngjs'
import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '@core/display/display'

export type RGB = [number, number, number]

export interface PngOptions {
  scale?: number
  on?: RGB
  off?: RGB
}

const ON: RGB = [255, 255, 255]
const OFF: RGB = [0, 0, 0]

// Nearest-neighbour upscale of the 64x32 framebuffer.
export function framebufferToPng(pixels: readonly boolean[], opts: PngOptions = {}): PNG {
  const scale = Math.max(1, Math.floor(opts.scale ?? 1))
  const on = opts.on ?? ON, off = opts.off ?? OFF
  const W = DISPLAY_WIDTH * scale, H = DISPLAY_HEIGHT * scale
  const png = new PNG({ width: W, height: H })
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    for (let x = 0; x < DISPLAY_WIDTH; x++) {
      const [r, g, b] = pixels[y * DISPLAY_WIDTH + x] ? on : off
      for (let dy = 0; dy < scale; dy++) {
        const oy = (y * scale + dy) * W
        for (let dx = 0; dx < scale; dx++) {
          const o = (oy + (x * scale + dx)) << 2
          png.data[o + 0] = r
          png.data[o + 1] = g
          png.data[o + 2] = b
          png.data[o + 3] = 255
        }
      }
    }
  }
  return png
}

export const writePng = async (outPath: string, png: PNG): Promise<void> => {
  fs.mkdirSync(path.dirname(outPath), { recursive: true })
  const stream = fs.createWriteStream(outPath)
  await new Promise<void>((resolve, reject) => {
    stream.on('finish', () => resolve())
    stream.on('error', (e) => reject(e))
    png.pack().pipe(stream)
  })
}
