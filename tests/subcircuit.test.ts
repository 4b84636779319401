// Tests for subcircuit elaboration

import { describe, it, expect } from 'vitest';
import { ComponentRegistry } from '../src/registry/registry.js';
import {
  SubcircuitComponent,
  instantiateSubcircuit,
} from '../src/elaborator/subcircuit.js';
import { Machine } from '../src/simulator/machine.js';
import { PatchBay } from '../src/simulator/patch-bay.js';
import type { Component } from '../src/components/component.js';
import type { SubcircuitDef } from '../src/types/circuit.js';
import {
  DuplicateComponentError,
  PortMappingError,
  TemplateCycleError,
  UnknownComponentError,
  UnknownPortError,
} from '../src/types/errors.js';

// Two serial gain stages: out = in * 2 * 3
const CHAIN: SubcircuitDef = {
  name: 'Chain',
  description: 'Two gain stages',
  inputs: ['in'],
  outputs: ['out'],
  components: [
    { name: 'A', type: 'Coefficient', params: { k: 2 } },
    { name: 'B', type: 'Coefficient', params: { k: 3 } },
  ],
  patches: [['A.out', 'B.in']],
  output_map: { out: 'B.out' },
};

function setup() {
  const registry = new ComponentRegistry();
  registry.register('Chain', CHAIN);
  const machine = new Machine();
  const patchBay = new PatchBay();
  return { registry, machine, patchBay, context: { machine, patchBay } };
}

function instantiate(def: SubcircuitDef, instanceName: string) {
  const { registry, machine, patchBay } = setup();
  registry.register(def.name, def);
  const component = registry.create(def.name, instanceName, {}, { machine, patchBay });
  return { component, machine, patchBay };
}

function tick(machine: Machine, patchBay: PatchBay, n: number = 1): void {
  for (let i = 0; i < n; i++) {
    patchBay.propagate();
    machine.step();
  }
}

function port(component: Component, direction: 'inputs' | 'outputs', name: string) {
  const p = component[direction].get(name);
  if (!p) throw new Error(`${component.name} has no ${direction} port ${name}`);
  return p;
}

describe('Subcircuits', () => {
  it('should flatten members into the machine with prefixed names', () => {
    const { registry, machine, context } = setup();
    const chain = registry.create('Chain', 'C1', {}, context);

    expect(machine.components.map((c) => c.name)).toEqual(['C1.A', 'C1.B']);
    expect(machine.components).not.toContain(chain);
  });

  it('should wire internal patches into the patch bay', () => {
    const { registry, patchBay, context } = setup();
    registry.create('Chain', 'C1', {}, context);
    expect(patchBay.size).toBe(1);
  });

  it('should expose exactly the declared ports', () => {
    const { registry, context } = setup();
    const chain = registry.create('Chain', 'C1', {}, context);
    expect([...chain.inputs.keys()]).toEqual(['in']);
    expect([...chain.outputs.keys()]).toEqual(['out']);
  });

  it('should expose the members\' actual ports', () => {
    const { registry, machine, context } = setup();
    const chain = registry.create('Chain', 'C1', {}, context);
    const a = machine.findComponent('C1.A');
    const b = machine.findComponent('C1.B');
    if (!a || !b) throw new Error('members missing');

    // "in" is unmapped: first member with an "in" port is A
    expect(port(chain, 'inputs', 'in')).toBe(port(a, 'inputs', 'in'));
    expect(port(chain, 'outputs', 'out')).toBe(port(b, 'outputs', 'out'));
  });

  it('should settle one stage per cycle', () => {
    const { registry, machine, patchBay, context } = setup();
    const chain = registry.create('Chain', 'C1', {}, context);
    const a = machine.findComponent('C1.A');
    if (!a) throw new Error('member missing');

    port(chain, 'inputs', 'in').write(5);

    tick(machine, patchBay);
    expect(port(a, 'outputs', 'out').read()).toBe(10);
    expect(port(chain, 'outputs', 'out').read()).toBe(0);

    tick(machine, patchBay);
    expect(port(chain, 'outputs', 'out').read()).toBe(30);
  });

  it('should honour input_map over the declaration-order scan', () => {
    const { component, machine } = instantiate(
      {
        name: 'Pair',
        description: '',
        inputs: ['in'],
        outputs: ['out'],
        components: [
          { name: 'FIRST', type: 'Inverter' },
          { name: 'SECOND', type: 'Coefficient' },
        ],
        patches: [],
        input_map: { in: 'SECOND.in' },
      },
      'P'
    );
    const first = machine.findComponent('P.FIRST');
    const second = machine.findComponent('P.SECOND');
    if (!first || !second) throw new Error('members missing');

    expect(port(component, 'inputs', 'in')).toBe(port(second, 'inputs', 'in'));
    expect(port(component, 'outputs', 'out')).toBe(port(first, 'outputs', 'out'));
  });

  it('should report an exposed port nothing provides', () => {
    const def: SubcircuitDef = {
      name: 'Broken',
      description: '',
      inputs: ['x'],
      outputs: [],
      components: [{ name: 'K', type: 'Coefficient' }],
      patches: [],
    };
    expect(() => instantiate(def, 'S1')).toThrow(PortMappingError);
    expect(() => instantiate(def, 'S1')).toThrow(
      "Could not find input port 'x' in subcircuit instance 'S1'. Use input_map to specify mapping."
    );
  });

  it('should report an internal patch to an unknown member', () => {
    const def: SubcircuitDef = {
      name: 'Broken',
      description: '',
      inputs: [],
      outputs: [],
      components: [{ name: 'K', type: 'Coefficient' }],
      patches: [['K.out', 'GHOST.in']],
    };
    expect(() => instantiate(def, 'S1')).toThrow(UnknownComponentError);
    expect(() => instantiate(def, 'S1')).toThrow(
      "Subcircuit 'Broken' (instance 'S1') references unknown component 'GHOST'"
    );
  });

  it('should report an internal patch to an unknown port', () => {
    const def: SubcircuitDef = {
      name: 'Broken',
      description: '',
      inputs: [],
      outputs: [],
      components: [{ name: 'K', type: 'Coefficient' }],
      patches: [['K.result', 'K.in']],
    };
    expect(() => instantiate(def, 'S1')).toThrow(UnknownPortError);
    expect(() => instantiate(def, 'S1')).toThrow("Component 'K' has no output port 'result'");
  });

  it('should reject a template that repeats a local name', () => {
    const { registry } = setup();
    const dup: SubcircuitDef = {
      name: 'Dup',
      description: '',
      inputs: [],
      outputs: [],
      components: [
        { name: 'A', type: 'Coefficient' },
        { name: 'A', type: 'Inverter' },
      ],
      patches: [],
    };
    expect(() => registry.register('Dup', dup)).toThrow(DuplicateComponentError);
    expect(() => registry.register('Dup', dup)).toThrow("Duplicate component name 'Dup.A'");
    expect(registry.has('Dup')).toBe(false);
  });

  it('should stop expanding at a repeated local name', () => {
    const { registry, machine, patchBay } = setup();
    const dup: SubcircuitDef = {
      name: 'Dup',
      description: '',
      inputs: [],
      outputs: [],
      components: [
        { name: 'A', type: 'Coefficient' },
        { name: 'A', type: 'Inverter' },
      ],
      patches: [],
    };
    expect(() => instantiateSubcircuit(dup, 'D', registry, { machine, patchBay })).toThrow(
      "Duplicate component name 'D.A'"
    );
    expect(machine.components.map((c) => c.name)).toEqual(['D.A']);
  });

  it('should not mistake inherited object keys for port mappings', () => {
    const unmapped: SubcircuitDef = {
      name: 'Odd',
      description: '',
      inputs: ['toString'],
      outputs: [],
      components: [{ name: 'A', type: 'Inverter' }],
      patches: [],
    };
    expect(() => instantiate(unmapped, 'S1')).toThrow(PortMappingError);
    expect(() => instantiate(unmapped, 'S1')).toThrow(
      "Could not find input port 'toString' in subcircuit instance 'S1'. Use input_map to specify mapping."
    );

    const mapped: SubcircuitDef = {
      ...unmapped,
      input_map: { toString: 'A.in' },
    };
    const { component, machine } = instantiate(mapped, 'S2');
    const a = machine.findComponent('S2.A');
    if (!a) throw new Error('member missing');
    expect(port(component, 'inputs', 'toString')).toBe(port(a, 'inputs', 'in'));
  });

  describe('nesting', () => {
    const OUTER: SubcircuitDef = {
      name: 'Outer',
      description: '',
      inputs: ['in'],
      outputs: ['out'],
      components: [
        { name: 'P', type: 'Coefficient', params: { k: 1 } },
        { name: 'I1', type: 'Chain' },
        { name: 'I2', type: 'Chain' },
      ],
      patches: [
        ['P.out', 'I1.in'],
        ['I1.out', 'I2.in'],
      ],
      output_map: { out: 'I2.out' },
    };

    it('should flatten nested instances with compound prefixes', () => {
      const { component, machine } = instantiate(OUTER, 'O');
      expect(machine.components.map((c) => c.name)).toEqual([
        'O.P',
        'O.I1.A',
        'O.I1.B',
        'O.I2.A',
        'O.I2.B',
      ]);
      expect(component).toBeInstanceOf(SubcircuitComponent);
      if (component instanceof SubcircuitComponent) {
        expect(component.primitives().map((c) => c.name)).toEqual(
          machine.components.map((c) => c.name)
        );
        expect([...component.members.keys()]).toEqual(['P', 'I1', 'I2']);
      }
    });

    it('should need one cycle per serial stage', () => {
      const { component, machine, patchBay } = instantiate(OUTER, 'O');
      port(component, 'inputs', 'in').write(1);

      tick(machine, patchBay, 4);
      expect(port(component, 'outputs', 'out').read()).toBe(0);

      tick(machine, patchBay);
      expect(port(component, 'outputs', 'out').read()).toBe(36);
    });

    it('should reset flattened state through the machine', () => {
      const { component, machine, patchBay } = instantiate(OUTER, 'O');
      port(component, 'inputs', 'in').write(1);
      tick(machine, patchBay, 5);
      machine.reset();
      expect(port(component, 'outputs', 'out').read()).toBe(0);
    });
  });

  it('should refuse to expand a template already on the chain', () => {
    const { registry, machine, patchBay } = setup();
    const template = registry.getTemplate('Chain');
    if (!template) throw new Error('template missing');
    expect(() =>
      instantiateSubcircuit(template, 'X', registry, {
        machine,
        patchBay,
        chain: ['Outer', 'Chain'],
      })
    ).toThrow(TemplateCycleError);
  });

  it('should not step or reset through the wrapper', () => {
    const { registry, machine, patchBay, context } = setup();
    const chain = registry.create('Chain', 'C1', {}, context);
    port(chain, 'inputs', 'in').write(1);
    tick(machine, patchBay, 2);

    chain.step(0.001);
    chain.reset();
    expect(port(chain, 'outputs', 'out').read()).toBe(6);
  });
});
