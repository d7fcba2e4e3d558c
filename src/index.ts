export * from './emulator/types';
export * from './emulator/faults';
export * from './emulator/config';
export { Machine } from './emulator/machine';
export type { LoadResult, MachineSnapshot, StepResult } from './emulator/machine';
export { Scheduler } from './emulator/scheduler';
export type { HaltReason, MachineHost, RunOptions, RunOutcome, SchedulerOptions } from './emulator/scheduler';
export { Timers } from './emulator/timers';
export { Memory } from './memory/memory';
export { FONT_SET, fontAddress } from './memory/font';
export { CPU, mathRandomByte } from './cpu/cpu';
export type { CPUDeps, CPUState, RandomByte } from './cpu/cpu';
export { decode } from './cpu/decode';
export type { Instruction, Opcode } from './cpu/decode';
export { disassemble, disassembleRange, formatInstruction } from './cpu/disasm';
export { Display } from './display/display';
export type { DisplayOptions } from './display/display';
export { encodePNG, renderAscii, renderRGBA } from './display/render';
export type { Framebuffer, RGBAImage, RGBAOptions } from './display/render';
export { Keypad } from './input/keypad';
export { checkRomSize, parseHexProgram, readRomFile } from './rom/loader';
