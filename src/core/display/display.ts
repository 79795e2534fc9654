import type { Byte } from '@core/cpu/types';

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;
export const DISPLAY_PIXELS = DISPLAY_WIDTH * DISPLAY_HEIGHT;

// Monochrome 64x32 framebuffer, row-major. Only CLS and DRW mutate it.
export class Display {
  private pixels: boolean[] = new Array<boolean>(DISPLAY_PIXELS).fill(false);
  // Bumped on every mutation so hosts can skip redrawing an unchanged frame.
  private version = 0;

  clear(): void {
    this.pixels.fill(false);
    this.version++;
  }

  getPixel(x: number, y: number): boolean {
    return this.pixels[(y % DISPLAY_HEIGHT) * DISPLAY_WIDTH + (x % DISPLAY_WIDTH)];
  }

  getPixels(): readonly boolean[] {
    return this.pixels;
  }

  getVersion(): number {
    return this.version;
  }

  // XOR an 8-pixel-wide sprite onto the screen at (x, y). Every pixel wraps on
  // its own (mod 64 / mod 32), nothing is clipped. Returns true when a lit
  // pixel was turned off.
  drawSprite(x: number, y: number, rows: ArrayLike<Byte>): boolean {
    let collision = false;
    for (let row = 0; row < rows.length; row++) {
      const bits = rows[row] & 0xff;
      if (bits === 0) continue;
      const py = (y + row) % DISPLAY_HEIGHT;
      for (let col = 0; col < 8; col++) {
        if ((bits & (0x80 >>> col)) === 0) continue;
        const px = (x + col) % DISPLAY_WIDTH;
        const idx = py * DISPLAY_WIDTH + px;
        if (this.pixels[idx]) collision = true;
        this.pixels[idx] = !this.pixels[idx];
      }
    }
    this.version++;
    return collision;
  }
}
