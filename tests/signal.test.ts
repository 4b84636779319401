// Tests for signals and ports

import { describe, it, expect } from 'vitest';
import { Signal, Port } from '../src/simulator/signal.js';

describe('Signal', () => {
  it('should start at 0', () => {
    expect(new Signal().read()).toBe(0);
  });

  it('should accept an initial value', () => {
    expect(new Signal(2.5).read()).toBe(2.5);
  });

  it('should return the last value written', () => {
    const s = new Signal();
    s.write(3);
    s.write(-7.25);
    expect(s.read()).toBe(-7.25);
  });
});

describe('Port', () => {
  it('should own a fresh signal by default', () => {
    const a = new Port('out');
    const b = new Port('out');
    a.write(4);
    expect(a.read()).toBe(4);
    expect(b.read()).toBe(0);
    expect(a.signal).not.toBe(b.signal);
  });

  it('should give every port a distinct id', () => {
    const a = new Port('in');
    const b = new Port('in');
    expect(a.id).not.toBe(b.id);
    expect(b.id).toBeGreaterThan(a.id);
  });

  it('should share a signal passed in by the caller', () => {
    const shared = new Signal();
    const a = new Port('a', shared);
    const b = new Port('b', shared);
    a.write(9);
    expect(b.read()).toBe(9);
  });

  it('should keep its name', () => {
    expect(new Port('den').name).toBe('den');
  });
});
