import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PNG } from 'pngjs';
import { framebufferToPng, writePng } from '@host/png';
import { Display } from '@core/display/display';

let dir = '';
beforeAll(() => { dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chip8-png-')); });
afterAll(() => { fs.rmSync(dir, { recursive: true, force: true }); });

const rgbaAt = (png: PNG, x: number, y: number) => {
  const o = (y * png.width + x) << 2;
  return Array.from(png.data.subarray(o, o + 4));
};

describe('Framebuffer PNG', () => {
  it('scales each pixel to a square block', () => {
    const d = new Display();
    d.drawSprite(1, 0, [0x80]);
    const png = framebufferToPng(d.getPixels(), { scale: 3 });
    expect(png.width).toBe(192);
    expect(png.height).toBe(96);
    expect(rgbaAt(png, 3, 0)).toEqual([255, 255, 255, 255]);
    expect(rgbaAt(png, 5, 2)).toEqual([255, 255, 255, 255]);
    expect(rgbaAt(png, 2, 0)).toEqual([0, 0, 0, 255]);
    expect(rgbaAt(png, 6, 0)).toEqual([0, 0, 0, 255]);
    expect(rgbaAt(png, 3, 3)).toEqual([0, 0, 0, 255]);
  });

  it('uses the given colours', () => {
    const d = new Display();
    d.drawSprite(0, 0, [0x80]);
    const png = framebufferToPng(d.getPixels(), { on: [10, 200, 30], off: [1, 2, 3] });
    expect(rgbaAt(png, 0, 0)).toEqual([10, 200, 30, 255]);
    expect(rgbaAt(png, 1, 0)).toEqual([1, 2, 3, 255]);
  });

  it('writes a file that decodes to the same image', async () => {
    const d = new Display();
    d.drawSprite(10, 5, [0xFF]);
    const out = path.join(dir, 'nested', 'frame.png');
    await writePng(out, framebufferToPng(d.getPixels(), { scale: 2 }));
    const decoded = PNG.sync.read(fs.readFileSync(out));
    expect(decoded.width).toBe(128);
    expect(decoded.height).toBe(64);
    expect(rgbaAt(decoded, 20, 10)).toEqual([255, 255, 255, 255]);
    expect(rgbaAt(decoded, 19, 10)).toEqual([0, 0, 0, 255]);
  });
});
