import { describe, it, expect } from 'vitest';
import { Timers } from '../../src/emulator/timers';

describe('Timers', () => {
  it('count down to zero and stop', () => {
    const t = new Timers();
    t.delay = 2;
    t.sound = 1;
    t.tick();
    expect(t.delay).toBe(1);
    expect(t.sound).toBe(0);
    t.tick();
    t.tick();
    expect(t.delay).toBe(0);
    expect(t.sound).toBe(0);
  });

  it('mask stored values to 8 bits', () => {
    const t = new Timers();
    t.delay = 0x1ff;
    expect(t.delay).toBe(0xff);
  });

  it('reports sound while the sound timer is nonzero', () => {
    const t = new Timers();
    expect(t.isSoundActive()).toBe(false);
    t.sound = 1;
    expect(t.isSoundActive()).toBe(true);
    t.reset();
    expect(t.isSoundActive()).toBe(false);
  });
});
