import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '@core/display/display'

const FULL = '█'
const UPPER = '▀'
const LOWER = '▄'

// Two framebuffer rows per text line using half-block glyphs: 64x32 -> 64x16.
export function renderFrame(pixels: readonly boolean[]): string[] {
  const lines: string[] = []
  for (let y = 0; y < DISPLAY_HEIGHT; y += 2) {
    let line = ''
    for (let x = 0; x < DISPLAY_WIDTH; x++) {
      const top = pixels[y * DISPLAY_WIDTH + x] === true
      const bottom = pixels[(y + 1) * DISPLAY_WIDTH + x] === true
      line += top && bottom ? FULL : top ? UPPER : bottom ? LOWER : ' '
    }
    lines.push(line)
  }
  return lines
}
