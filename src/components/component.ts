// Component interface shared by primitives and subcircuit wrappers

import { Port, PortMap } from '../simulator/signal.js';
import type { ParamRecord } from '../types/circuit.js';

export interface Component {
  readonly name: string;
  // Primitive type name, or the template name for a subcircuit instance
  readonly type: string;
  readonly inputs: PortMap;
  readonly outputs: PortMap;

  step(dt: number): void;
  reset(): void;
}

/**
 * Base for the primitive library. Subclasses create their ports in the
 * constructor, in the order they should be enumerated.
 */
export abstract class PrimitiveComponent implements Component {
  readonly name: string;
  readonly inputs: PortMap = new Map();
  readonly outputs: PortMap = new Map();

  abstract readonly type: string;

  constructor(name: string) {
    this.name = name;
  }

  abstract step(dt: number): void;
  abstract reset(): void;

  /**
   * Current construction parameters, in the form the registry accepts
   */
  abstract params(): ParamRecord;

  protected addInput(name: string): Port {
    const port = new Port(name);
    this.inputs.set(name, port);
    return port;
  }

  protected addOutput(name: string): Port {
    const port = new Port(name);
    this.outputs.set(name, port);
    return port;
  }
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

// Phase in [0, 1), also for negative frequency
export function phaseOf(frequency: number, time: number): number {
  const cycles = frequency * time;
  return ((cycles % 1) + 1) % 1;
}
