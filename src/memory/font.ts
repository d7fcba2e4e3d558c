import glyphs from './font.json';
import { FONT_BASE, FONT_GLYPH_BYTES } from '../emulator/types';
import { Chip8Fault } from '../emulator/faults';

// Hex digit sprites 0-F, 4 pixels wide, 5 rows each
export const FONT_SET: Uint8Array = Uint8Array.from(glyphs.flat());

export function fontAddress(digit: number): number {
  if (!Number.isInteger(digit) || digit < 0 || digit > 0xf) {
    throw new Chip8Fault('UnmappedFont', `no font glyph for digit ${digit}`);
  }
  return FONT_BASE + digit * FONT_GLYPH_BYTES;
}
