// Save a live machine and patch bay back to the declarative schema

import { PrimitiveComponent, type Component } from '../components/component.js';
import type { Machine } from '../simulator/machine.js';
import type { PatchBay } from '../simulator/patch-bay.js';
import type { PortId } from '../simulator/signal.js';
import type { CircuitDecl, ComponentDecl, PatchDecl, ScopeDecl } from '../types/circuit.js';
import { formatPortRef } from './port-ref.js';

export interface SaveOptions {
  name?: string;
  description?: string;
  scope?: ScopeDecl;
}

/**
 * Produce a circuit declaration that rebuilds the same machine.
 *
 * Subcircuit instances are saved flattened: their members appear as the
 * dotted primitives the machine actually steps, with their internal patches.
 * Edges whose ports belong to no machine component are left out.
 */
export function saveCircuit(
  machine: Machine,
  patchBay: PatchBay,
  options: SaveOptions = {}
): CircuitDecl {
  const outputOwners = new Map<PortId, Component>();
  const inputOwners = new Map<PortId, Component>();
  const components: ComponentDecl[] = [];

  for (const component of machine.components) {
    const decl: ComponentDecl = { name: component.name, type: component.type };
    if (component instanceof PrimitiveComponent) {
      const params = component.params();
      if (Object.keys(params).length > 0) {
        decl.params = params;
      }
    }
    components.push(decl);

    for (const port of component.outputs.values()) {
      outputOwners.set(port.id, component);
    }
    for (const port of component.inputs.values()) {
      inputOwners.set(port.id, component);
    }
  }

  const patches: PatchDecl[] = [];
  for (const { source, dest } of patchBay.getConnections()) {
    const sourceOwner = outputOwners.get(source.id);
    const destOwner = inputOwners.get(dest.id);
    if (sourceOwner && destOwner) {
      patches.push([
        formatPortRef(sourceOwner.name, source.name),
        formatPortRef(destOwner.name, dest.name),
      ]);
    }
  }

  const circuit: CircuitDecl = {
    name: options.name ?? 'circuit',
    description: options.description ?? '',
    components,
    patches,
  };
  if (options.scope) {
    circuit.scope = options.scope;
  }
  return circuit;
}
