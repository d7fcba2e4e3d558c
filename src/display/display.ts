import { DISPLAY_HEIGHT, DISPLAY_WIDTH, IDisplay } from '../emulator/types';

export interface DisplayOptions {
  // Drop pixels past the right/bottom edge instead of wrapping them
  clip?: boolean;
}

// 64x32 monochrome framebuffer, one byte (0/1) per pixel, row-major.
export class Display implements IDisplay {
  readonly width = DISPLAY_WIDTH;
  readonly height = DISPLAY_HEIGHT;
  private readonly pixels = new Uint8Array(DISPLAY_WIDTH * DISPLAY_HEIGHT);
  private dirty = false;
  private readonly clip: boolean;

  constructor(opts: DisplayOptions = {}) {
    this.clip = opts.clip ?? false;
  }

  clear(): void {
    this.pixels.fill(0);
    this.dirty = true;
  }

  /**
   * XOR an 8-pixel-wide sprite into the framebuffer. The start position wraps
   * to the screen; pixels beyond the edge wrap too unless clipping is on.
   * Returns true when any lit pixel was turned off.
   */
  drawSprite(x: number, y: number, sprite: ArrayLike<number>): boolean {
    const x0 = x % DISPLAY_WIDTH;
    const y0 = y % DISPLAY_HEIGHT;
    let collision = false;
    for (let r = 0; r < sprite.length; r++) {
      const py = y0 + r;
      if (this.clip && py >= DISPLAY_HEIGHT) break;
      const row = (py % DISPLAY_HEIGHT) * DISPLAY_WIDTH;
      const bits = sprite[r] & 0xff;
      for (let c = 0; c < 8; c++) {
        if ((bits & (0x80 >> c)) === 0) continue;
        const px = x0 + c;
        if (this.clip && px >= DISPLAY_WIDTH) break;
        const idx = row + (px % DISPLAY_WIDTH);
        if (this.pixels[idx] === 1) collision = true;
        this.pixels[idx] ^= 1;
      }
    }
    this.dirty = true;
    return collision;
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= DISPLAY_WIDTH || y >= DISPLAY_HEIGHT) return false;
    return this.pixels[y * DISPLAY_WIDTH + x] === 1;
  }

  framebuffer(): Readonly<Uint8Array> {
    return this.pixels;
  }

  litCount(): number {
    let n = 0;
    for (let i = 0; i < this.pixels.length; i++) n += this.pixels[i];
    return n;
  }

  isDirty(): boolean { return this.dirty; }
  clearDirty(): void { this.dirty = false; }
}
