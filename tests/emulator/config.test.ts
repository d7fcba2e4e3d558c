import { describe, it, expect } from 'vitest';
import { faultModeFor, parseFaultPolicy, parseQuirks, resolveInstructionsPerTick, resolveOptionsFromEnv } from '../../src/emulator/config';

describe('Machine options from the environment', () => {
  it('reads CHIP8_* variables', () => {
    expect(resolveOptionsFromEnv({
      CHIP8_IPS: '12',
      CHIP8_ON_FAULT: 'ignore',
      CHIP8_TRACE: '100',
      CHIP8_QUIRKS: 'shiftUsesVy, clipSprites,bogus',
    })).toEqual({
      instructionsPerTick: 12,
      onFault: 'ignore',
      traceEveryInstr: 100,
      quirks: { shiftUsesVy: true, clipSprites: true },
    });
  });

  it('skips malformed values', () => {
    expect(resolveOptionsFromEnv({
      CHIP8_IPS: 'abc',
      CHIP8_ON_FAULT: 'explode',
      CHIP8_TRACE: '-1',
      CHIP8_QUIRKS: '',
    })).toEqual({});
    expect(resolveOptionsFromEnv({ CHIP8_IPS: '0' })).toEqual({});
  });

  it('parses per-kind fault policies', () => {
    expect(parseFaultPolicy('InvalidOpcode=ignore, StackOverflow=halt')).toEqual({
      InvalidOpcode: 'ignore',
      StackOverflow: 'halt',
    });
    expect(parseFaultPolicy('halt')).toBe('halt');
    expect(parseFaultPolicy('Nope=ignore')).toBeUndefined();
    expect(parseFaultPolicy('InvalidOpcode=maybe')).toBeUndefined();
  });

  it('defaults every fault kind to halt', () => {
    expect(faultModeFor(undefined, 'InvalidOpcode')).toBe('halt');
    expect(faultModeFor('ignore', 'StackOverflow')).toBe('ignore');
    expect(faultModeFor({ InvalidOpcode: 'ignore' }, 'InvalidOpcode')).toBe('ignore');
    expect(faultModeFor({ InvalidOpcode: 'ignore' }, 'StackOverflow')).toBe('halt');
  });

  it('parseQuirks keeps only known names', () => {
    expect(parseQuirks('memoryIncrementsI,jumpUsesVx,nope')).toEqual({ memoryIncrementsI: true, jumpUsesVx: true });
  });

  it('resolveInstructionsPerTick floors and clamps', () => {
    expect(resolveInstructionsPerTick(undefined)).toBe(10);
    expect(resolveInstructionsPerTick(Number.NaN)).toBe(10);
    expect(resolveInstructionsPerTick(-3)).toBe(1);
    expect(resolveInstructionsPerTick(12.5)).toBe(12);
  });
});
