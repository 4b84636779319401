// Subcircuit elaboration: flatten a template into prefixed primitives

import type { Component } from '../components/component.js';
import type { PortDirection, PortMap } from '../simulator/signal.js';
import type { PortRef } from '../types/circuit.js';
import type {
  BuildContext,
  ComponentRegistry,
  SubcircuitTemplate,
} from '../registry/registry.js';
import {
  DuplicateComponentError,
  PortMappingError,
  TemplateCycleError,
  UnknownComponentError,
  UnknownPortError,
} from '../types/errors.js';
import { parsePortRef } from '../circuit/port-ref.js';

export interface ExposedPorts {
  inputs: PortMap;
  outputs: PortMap;
}

export interface Instantiation extends ExposedPorts {
  // Local (unprefixed) name -> component, in declaration order
  members: Map<string, Component>;
}

function lookupLocal(
  members: Map<string, Component>,
  ref: PortRef,
  direction: PortDirection,
  scope: string
) {
  const { component: localName, port: portName } = parsePortRef(ref, 'first');
  const component = members.get(localName);
  if (!component) {
    throw new UnknownComponentError(localName, scope);
  }
  const port = component[direction].get(portName);
  if (!port) {
    throw new UnknownPortError(
      localName,
      portName,
      direction === 'inputs' ? 'input' : 'output'
    );
  }
  return port;
}

/**
 * Expand `template` as `instanceName` into the context's machine and patch bay.
 *
 * 1. Every internal component is built through the registry as
 *    `instanceName.localName`. Primitives join the machine in declaration
 *    order; a nested subcircuit recurses and adds its own primitives.
 * 2. Internal patches resolve against this instantiation's members only.
 * 3. Each declared input/output is taken from input_map/output_map, or else
 *    from the first member (in declaration order) with a port of that exact
 *    name.
 *
 * The returned tables hold the members' actual ports. Nothing is stepped
 * here: the flattened stages settle one hop per propagate/step cycle.
 */
export function instantiateSubcircuit(
  template: SubcircuitTemplate,
  instanceName: string,
  registry: ComponentRegistry,
  context: BuildContext,
  typeName: string = template.name
): Instantiation {
  const chain = context.chain ?? [];
  if (chain.includes(typeName)) {
    throw new TemplateCycleError([...chain, typeName]);
  }
  const inner: BuildContext = { ...context, chain: [...chain, typeName] };
  const scope = `Subcircuit '${typeName}' (instance '${instanceName}')`;

  // 1. Members
  const members = new Map<string, Component>();
  for (const decl of template.components) {
    const prefixed = `${instanceName}.${decl.name}`;
    if (members.has(decl.name)) {
      throw new DuplicateComponentError(prefixed);
    }
    const component = registry.create(decl.type, prefixed, decl.params ?? {}, inner);
    if (!(component instanceof SubcircuitComponent)) {
      context.machine.add(component);
    }
    members.set(decl.name, component);
  }

  // 2. Internal wiring
  for (const [source, dest] of template.patches) {
    const sourcePort = lookupLocal(members, source, 'outputs', scope);
    const destPort = lookupLocal(members, dest, 'inputs', scope);
    context.patchBay.connect(sourcePort, destPort);
  }

  // 3./4. Exposed ports
  const exposePorts = (
    names: readonly string[],
    map: Readonly<Record<string, PortRef>>,
    direction: PortDirection
  ): PortMap => {
    const table: PortMap = new Map();
    for (const name of names) {
      if (Object.prototype.hasOwnProperty.call(map, name)) {
        table.set(name, lookupLocal(members, map[name], direction, scope));
        continue;
      }
      let found = false;
      for (const member of members.values()) {
        const port = member[direction].get(name);
        if (port) {
          table.set(name, port);
          found = true;
          break;
        }
      }
      if (!found) {
        throw new PortMappingError(
          instanceName,
          name,
          direction === 'inputs' ? 'input' : 'output'
        );
      }
    }
    return table;
  };

  return {
    inputs: exposePorts(template.inputs, template.input_map ?? {}, 'inputs'),
    outputs: exposePorts(template.outputs, template.output_map ?? {}, 'outputs'),
    members,
  };
}

/**
 * Passive stand-in for a subcircuit instance so outer wiring can address it
 * like any other component. Its ports are the internal members' ports; step
 * and reset do nothing because the members are stepped and reset by the
 * machine directly.
 */
export class SubcircuitComponent implements Component {
  readonly name: string;
  readonly type: string;
  readonly template: SubcircuitTemplate;
  readonly inputs: PortMap;
  readonly outputs: PortMap;
  readonly members: ReadonlyMap<string, Component>;

  constructor(
    name: string,
    type: string,
    template: SubcircuitTemplate,
    registry: ComponentRegistry,
    context: BuildContext
  ) {
    this.name = name;
    this.type = type;
    this.template = template;
    const { inputs, outputs, members } = instantiateSubcircuit(
      template,
      name,
      registry,
      context,
      type
    );
    this.inputs = inputs;
    this.outputs = outputs;
    this.members = members;
  }

  step(_dt: number): void {}

  reset(): void {}

  /**
   * Every primitive this instance flattened into, nested ones included
   */
  primitives(): Component[] {
    const result: Component[] = [];
    for (const member of this.members.values()) {
      if (member instanceof SubcircuitComponent) {
        result.push(...member.primitives());
      } else {
        result.push(member);
      }
    }
    return result;
  }
}
