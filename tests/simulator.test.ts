// Tests for the simulation driver

import { describe, it, expect } from 'vitest';
import { Simulator } from '../src/simulator/simulator.js';
import type { CircuitDecl } from '../src/types/circuit.js';
import { UnknownComponentError, UnknownPortError } from '../src/types/errors.js';

// x' = 2, x(0) = 0
const RAMP: CircuitDecl = {
  name: 'ramp',
  description: 'Integrates a constant',
  components: [
    { name: 'C', type: 'Constant', params: { value: 2 } },
    { name: 'INT', type: 'Integrator' },
  ],
  patches: [['C.out', 'INT.in']],
  scope: { channels: [{ source: 'INT.out', label: 'x' }] },
};

// x'' = -x, x(0) = 1
const HARMONIC: CircuitDecl = {
  name: 'harmonic',
  description: '',
  components: [
    { name: 'INT1', type: 'Integrator' },
    { name: 'INT2', type: 'Integrator', params: { initial: 1 } },
    { name: 'INV', type: 'Inverter' },
  ],
  patches: [
    ['INT1.out', 'INT2.in'],
    ['INT2.out', 'INV.in'],
    ['INV.out', 'INT1.in'],
  ],
};

describe('Simulator', () => {
  it('should propagate then step on every tick', () => {
    const sim = Simulator.fromCircuit(RAMP, { dt: 0.5 });
    sim.tick();
    expect(sim.probe('INT.out')).toBe(1);
    expect(sim.time).toBe(0.5);
    expect(sim.getCycle()).toBe(1);

    sim.run(2);
    expect(sim.probe('INT.out')).toBe(3);
    expect(sim.getCycle()).toBe(3);
  });

  it('should record one sample per tick after the step', () => {
    const sim = Simulator.fromCircuit(RAMP, { dt: 0.5 });
    sim.startRecording();
    sim.run(3);
    const samples = sim.stopRecording();

    expect(sim.getLabels()).toEqual(['x']);
    expect(samples).toEqual([
      { step: 0, time: 0.5, values: [1] },
      { step: 1, time: 1, values: [2] },
      { step: 2, time: 1.5, values: [3] },
    ]);
  });

  it('should stop recording when asked', () => {
    const sim = Simulator.fromCircuit(RAMP, { dt: 0.5 });
    sim.startRecording();
    sim.tick();
    const samples = sim.stopRecording();
    sim.tick();
    expect(samples).toHaveLength(1);
  });

  it('should export samples as CSV', () => {
    const sim = Simulator.fromCircuit(RAMP, { dt: 0.5 });
    sim.startRecording();
    sim.run(3);
    expect(sim.exportCSV(sim.stopRecording())).toBe('step,time,x\n0,0.5,1\n1,1,2\n2,1.5,3\n');
  });

  it('should label unlabeled channels by their source and quote awkward labels', () => {
    const sim = Simulator.fromCircuit(RAMP, { dt: 0.5 });
    sim.startRecording([{ source: 'C.out' }, { source: 'INT.out', label: 'a,b' }]);
    sim.tick();
    expect(sim.getLabels()).toEqual(['C.out', 'a,b']);
    expect(sim.exportCSV()).toBe('step,time,C.out,"a,b"\n0,0.5,2,1\n');
  });

  it('should reject a channel that does not resolve', () => {
    const sim = Simulator.fromCircuit(RAMP);
    expect(() => sim.startRecording([{ source: 'GHOST.out' }])).toThrow(UnknownComponentError);
  });

  it('should summarize recorded channels', () => {
    const sim = Simulator.fromCircuit(RAMP, { dt: 0.5 });
    sim.startRecording();
    sim.run(3);
    expect(sim.getStats(sim.stopRecording())).toEqual([
      { label: 'x', final: 3, min: 1, max: 3 },
    ]);
  });

  it('should report zeros for channels with no samples', () => {
    const sim = Simulator.fromCircuit(RAMP);
    sim.startRecording();
    expect(sim.getStats()).toEqual([{ label: 'x', final: 0, min: 0, max: 0 }]);
  });

  it('should reset time, cycle count and component state', () => {
    const sim = Simulator.fromCircuit(RAMP, { dt: 0.5 });
    sim.run(4);
    sim.reset();
    expect(sim.time).toBe(0);
    expect(sim.getCycle()).toBe(0);
    expect(sim.probe('INT.out')).toBe(0);
    expect(sim.probe('C.out')).toBe(2);
  });

  it('should drive unpatched inputs directly', () => {
    const sim = Simulator.fromCircuit({
      name: 'gain',
      description: '',
      components: [{ name: 'K', type: 'Coefficient', params: { k: 3 } }],
      patches: [],
    });
    sim.setInput('K.in', 4);
    sim.tick();
    expect(sim.probe('K.out')).toBe(12);
    expect(() => sim.setInput('K.out', 1)).toThrow(UnknownPortError);
  });

  it('should list components in stepping order', () => {
    const sim = Simulator.fromCircuit(HARMONIC);
    expect(sim.listComponents()).toEqual(['INT1', 'INT2', 'INV']);
  });

  it('should keep a harmonic oscillator near the unit circle', () => {
    const sim = Simulator.fromCircuit(HARMONIC, { dt: 0.001 });
    sim.run(1000);
    const x = sim.probe('INT2.out');
    const v = sim.probe('INT1.out');
    expect(sim.time).toBeCloseTo(1, 9);
    expect(x).toBeCloseTo(Math.cos(1), 1);
    expect(v).toBeCloseTo(-Math.sin(1), 1);
  });
});
