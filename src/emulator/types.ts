export type Byte = number; // 0..255
export type Word = number; // 0..65535

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_PROGRAM_SIZE = MEMORY_SIZE - PROGRAM_START; // 0xE00
export const FONT_BASE = 0x000;
export const FONT_GLYPH_BYTES = 5;

export const DISPLAY_WIDTH = 64;
export const DISPLAY_HEIGHT = 32;

export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const KEY_COUNT = 16;

export interface IMemory {
  readByte(addr: number): Byte;
  readWord(addr: number): Word;
  writeByte(addr: number, value: Byte): void;
  checkRange(addr: number, length: number): void;
}

export interface IDisplay {
  clear(): void;
  drawSprite(x: number, y: number, sprite: ArrayLike<number>): boolean;
}

export interface IKeypad {
  isPressed(key: number): boolean;
  waitForKey(): number | null;
  clearPressLatch(): void;
}

export interface ITimers {
  delay: Byte;
  sound: Byte;
}

export interface Quirks {
  // 8xy6/8xyE shift Vy into Vx instead of shifting Vx in place
  shiftUsesVy: boolean;
  // Fx55/Fx65 leave I pointing past the last byte transferred
  memoryIncrementsI: boolean;
  // Bnnn jumps to nnn + Vx (x = high nibble of nnn)
  jumpUsesVx: boolean;
  // 8xy1/8xy2/8xy3 zero VF
  logicResetsVf: boolean;
  // sprites are cut at the screen edge instead of wrapping
  clipSprites: boolean;
}

export const DEFAULT_QUIRKS: Readonly<Quirks> = {
  shiftUsesVy: false,
  memoryIncrementsI: false,
  jumpUsesVx: false,
  logicResetsVf: false,
  clipSprites: false,
};

export interface LogSink {
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
}
