import { PNG } from 'pngjs';
import { DISPLAY_HEIGHT, DISPLAY_WIDTH } from '../emulator/types';

export type Framebuffer = Readonly<Uint8Array>;

export interface RGBAOptions {
  scale?: number;
  on?: number;  // 0xRRGGBB
  off?: number; // 0xRRGGBB
}

export interface RGBAImage {
  width: number;
  height: number;
  data: Uint8Array;
}

const DEFAULT_ON = 0xffffff;
const DEFAULT_OFF = 0x000000;

export function renderAscii(fb: Framebuffer, lit = '#', unlit = '.'): string {
  const lines: string[] = [];
  for (let y = 0; y < DISPLAY_HEIGHT; y++) {
    let line = '';
    for (let x = 0; x < DISPLAY_WIDTH; x++) line += fb[y * DISPLAY_WIDTH + x] ? lit : unlit;
    lines.push(line);
  }
  return lines.join('\n');
}

export function renderRGBA(fb: Framebuffer, opts: RGBAOptions = {}): RGBAImage {
  const scale = Math.max(1, Math.floor(opts.scale ?? 1));
  const on = opts.on ?? DEFAULT_ON;
  const off = opts.off ?? DEFAULT_OFF;
  const width = DISPLAY_WIDTH * scale;
  const height = DISPLAY_HEIGHT * scale;
  const data = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    const sy = Math.floor(y / scale);
    for (let x = 0; x < width; x++) {
      const sx = Math.floor(x / scale);
      const c = fb[sy * DISPLAY_WIDTH + sx] ? on : off;
      const o = (y * width + x) * 4;
      data[o] = (c >>> 16) & 0xff;
      data[o + 1] = (c >>> 8) & 0xff;
      data[o + 2] = c & 0xff;
      data[o + 3] = 0xff;
    }
  }
  return { width, height, data };
}

export function encodePNG(fb: Framebuffer, opts: RGBAOptions = {}): Buffer {
  const img = renderRGBA(fb, opts);
  const png = new PNG({ width: img.width, height: img.height });
  png.data.set(img.data);
  return PNG.sync.write(png);
}
