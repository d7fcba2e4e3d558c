import { describe, it, expect } from 'vitest';
import { captureLog, machineWith } from '../helpers/program';

describe('Machine.run scheduling', () => {
  it('runs N instructions per timer tick until maxTicks', () => {
    const m = machineWith([0x1200], { instructionsPerTick: 10 });
    const out = m.run({}, { maxTicks: 3 });
    expect(out).toEqual({ reason: 'maxTicks', fault: undefined, ticks: 3, instructions: 30, faultsIgnored: 0 });
  });

  it('ticks timers once per batch', () => {
    const m = machineWith([0x6005, 0xf015, 0x1204], { instructionsPerTick: 3 });
    m.run({}, { maxTicks: 3 });
    expect(m.timers.delay).toBe(2);
  });

  it('stops when the host frame callback returns false', () => {
    const m = machineWith([0x1200], { instructionsPerTick: 2 });
    const seen: number[] = [];
    const out = m.run({ onFrame: (_m, tick) => { seen.push(tick); return tick < 2; } });
    expect(out.reason).toBe('host');
    expect(out.ticks).toBe(2);
    expect(seen).toEqual([1, 2]);
  });

  it('honors requestHalt between instructions', () => {
    const m = machineWith([0x1200], { instructionsPerTick: 4 });
    const out = m.run({ onFrame: (machine) => { machine.requestHalt(); } });
    expect(out.reason).toBe('requested');
    expect(out.ticks).toBe(1);
    expect(out.instructions).toBe(4);
  });

  it('stops before the first instruction when a halt was requested before run', () => {
    const m = machineWith([0x6005, 0x1202], { instructionsPerTick: 4 });
    m.requestHalt();
    const out = m.run({}, { maxTicks: 3 });
    expect(out).toEqual({ reason: 'requested', fault: undefined, ticks: 0, instructions: 0, faultsIgnored: 0 });
    expect(m.cpu.v[0]).toBe(0);
    expect(m.consumeHaltRequest()).toBe(false);
  });

  it('falls back to the default batch size for a non-finite override', () => {
    const m = machineWith([0x1200]);
    const out = m.run({}, { instructionsPerTick: Number.NaN, maxTicks: 1 });
    expect(out.instructions).toBe(10);
  });

  it('halts on a fault by default and logs it', () => {
    const log = captureLog();
    const m = machineWith([0x5001], { log });
    const out = m.run({}, { maxTicks: 5 });
    expect(out.reason).toBe('fault');
    expect(out.fault?.kind).toBe('InvalidOpcode');
    expect(out.ticks).toBe(0);
    expect(out.instructions).toBe(0);
    expect(log.warnings).toEqual(['[FAULT] halting: InvalidOpcode pc=0x200 op=0x5001: unrecognized opcode 0x5001']);
  });

  it('ignore policy logs, skips the instruction and continues', () => {
    const log = captureLog();
    const m = machineWith([0x5001, 0x6007, 0x1204], { onFault: 'ignore', instructionsPerTick: 5, log });
    const out = m.run({}, { maxTicks: 1 });
    expect(out).toEqual({ reason: 'maxTicks', fault: undefined, ticks: 1, instructions: 4, faultsIgnored: 1 });
    expect(m.cpu.v[0]).toBe(7);
    expect(log.warnings).toEqual(['[FAULT] ignored: InvalidOpcode pc=0x200 op=0x5001: unrecognized opcode 0x5001']);
  });

  it('applies the policy per fault kind', () => {
    const m = machineWith([0x5001, 0x00ee], { onFault: { InvalidOpcode: 'ignore' } });
    const out = m.run({}, { maxTicks: 2 });
    expect(out.reason).toBe('fault');
    expect(out.fault?.kind).toBe('StackUnderflow');
    expect(out.faultsIgnored).toBe(1);
    expect(out.ticks).toBe(0);
  });

  it('polls host keys each tick so a waiting program resumes', () => {
    const m = machineWith([0xf10a, 0x1202], { instructionsPerTick: 3 });
    let tick = 0;
    const out = m.run({
      readKeys: () => (tick >= 1 ? 1 << 9 : 0),
      onFrame: (_m, t) => { tick = t; },
    }, { maxTicks: 2 });
    expect(out.instructions).toBe(6);
    expect(m.cpu.v[1]).toBe(9);
    expect(m.cpu.pc).toBe(0x202);
  });
});
