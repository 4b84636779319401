// Circuit builder: turns a circuit declaration into wired components

import type { Component } from '../components/component.js';
import { SubcircuitComponent } from '../elaborator/subcircuit.js';
import { ComponentRegistry, createDefaultRegistry } from '../registry/index.js';
import { Machine, DEFAULT_DT } from '../simulator/machine.js';
import { PatchBay } from '../simulator/patch-bay.js';
import type { Port, PortDirection } from '../simulator/signal.js';
import type { ChannelDecl, CircuitDecl, PortRef } from '../types/circuit.js';
import {
  DuplicateComponentError,
  UnknownComponentError,
  UnknownPortError,
} from '../types/errors.js';
import { parsePortRef } from './port-ref.js';

export interface BuildOptions {
  dt?: number;
  registry?: ComponentRegistry;
}

export interface BuiltCircuit {
  name: string;
  description: string;
  machine: Machine;
  patchBay: PatchBay;
  builder: CircuitBuilder;
  channels: ChannelDecl[];
}

function resolveIn(
  index: ReadonlyMap<string, Component>,
  ref: PortRef,
  direction: PortDirection
): Port {
  const { component: name, port: portName } = parsePortRef(ref, 'last');
  const component = index.get(name);
  if (!component) {
    throw new UnknownComponentError(name);
  }
  const port = component[direction].get(portName);
  if (!port) {
    throw new UnknownPortError(name, portName, direction === 'inputs' ? 'input' : 'output');
  }
  return port;
}

/**
 * Loads circuit declarations into a machine and patch bay.
 *
 * Every component that can be named in a reference is indexed by its full
 * name: top-level components, subcircuit instances, and everything a
 * subcircuit flattened into (`DIFF1.INT`, `outer.inner.leaf`). A reference
 * splits at its last dot, so `outer.inner.leaf.out` reaches the port `out` of
 * the flattened component `outer.inner.leaf`.
 *
 * A load is all-or-nothing: the declaration is built into a scratch machine and
 * patch bay, and only copied over once every component and patch resolved.
 */
export class CircuitBuilder {
  private readonly index: Map<string, Component> = new Map();
  // Top-level components and subcircuit instances, by declared name
  readonly instances: Map<string, Component> = new Map();

  constructor(
    readonly machine: Machine,
    readonly patchBay: PatchBay,
    private readonly registry: ComponentRegistry = createDefaultRegistry()
  ) {}

  load(decl: CircuitDecl): void {
    // Circuit-local subcircuits live in a child scope; the caller's registry
    // is left as it was
    const scope = this.registry.extend();
    for (const [key, def] of Object.entries(decl.subcircuits ?? {})) {
      scope.register(key, def);
    }

    const machine = new Machine(this.machine.dt);
    const patchBay = new PatchBay();
    const index = new Map(this.index);
    const instances = new Map<string, Component>();

    const claim = (component: Component): void => {
      if (index.has(component.name)) {
        throw new DuplicateComponentError(component.name);
      }
      index.set(component.name, component);
      if (component instanceof SubcircuitComponent) {
        for (const member of component.members.values()) {
          claim(member);
        }
      }
    };

    for (const componentDecl of decl.components) {
      if (index.has(componentDecl.name)) {
        throw new DuplicateComponentError(componentDecl.name);
      }
      const component = scope.create(
        componentDecl.type,
        componentDecl.name,
        componentDecl.params ?? {},
        { machine, patchBay }
      );
      if (!(component instanceof SubcircuitComponent)) {
        machine.add(component);
      }
      claim(component);
      instances.set(componentDecl.name, component);
    }

    for (const [source, dest] of decl.patches) {
      patchBay.connect(
        resolveIn(index, source, 'outputs'),
        resolveIn(index, dest, 'inputs')
      );
    }

    // Commit
    for (const component of machine.components) {
      this.machine.add(component);
    }
    for (const { source, dest } of patchBay.getConnections()) {
      this.patchBay.connect(source, dest);
    }
    for (const [name, component] of index) {
      this.index.set(name, component);
    }
    for (const [name, component] of instances) {
      this.instances.set(name, component);
    }
  }

  getComponent(name: string): Component | undefined {
    return this.index.get(name);
  }

  resolvePort(ref: PortRef, direction: PortDirection): Port {
    return resolveIn(this.index, ref, direction);
  }

  /**
   * Resolve a probe or scope source: outputs first, then inputs
   */
  findPort(ref: PortRef): Port {
    const { component: name, port: portName } = parsePortRef(ref, 'last');
    const component = this.index.get(name);
    if (!component) {
      throw new UnknownComponentError(name);
    }
    const port = component.outputs.get(portName) ?? component.inputs.get(portName);
    if (!port) {
      throw new UnknownPortError(name, portName, 'output');
    }
    return port;
  }
}

/**
 * Build a circuit into a fresh machine and patch bay
 */
export function buildCircuit(decl: CircuitDecl, options: BuildOptions = {}): BuiltCircuit {
  const machine = new Machine(options.dt ?? DEFAULT_DT);
  const patchBay = new PatchBay();
  const builder = new CircuitBuilder(
    machine,
    patchBay,
    options.registry ?? createDefaultRegistry()
  );
  builder.load(decl);

  return {
    name: decl.name,
    description: decl.description ?? '',
    machine,
    patchBay,
    builder,
    channels: decl.scope?.channels ?? [],
  };
}
