// Signal sources with no inputs

import { PrimitiveComponent } from './component.js';
import type { Port } from '../simulator/signal.js';
import type { ParamRecord } from '../types/circuit.js';

export interface VoltageSourceOptions {
  frequency: number;
  amplitude?: number;
}

/**
 * Sinusoidal source: out = amplitude * sin(2π * frequency * t)
 */
export class VoltageSource extends PrimitiveComponent {
  readonly type = 'VoltageSource' as const;
  readonly frequency: number;
  readonly amplitude: number;
  private time: number = 0;
  private readonly out: Port;

  constructor(name: string, options: VoltageSourceOptions) {
    super(name);
    this.frequency = options.frequency;
    this.amplitude = options.amplitude ?? 1;
    this.out = this.addOutput('out');
  }

  step(dt: number): void {
    this.time += dt;
    this.out.write(this.amplitude * Math.sin(2 * Math.PI * this.frequency * this.time));
  }

  reset(): void {
    this.time = 0;
    this.out.write(0);
  }

  params(): ParamRecord {
    return { frequency: this.frequency, amplitude: this.amplitude };
  }
}

export interface ConstantOptions {
  value?: number;
}

export class Constant extends PrimitiveComponent {
  readonly type = 'Constant' as const;
  readonly value: number;
  private readonly out: Port;

  constructor(name: string, options: ConstantOptions = {}) {
    super(name);
    this.value = options.value ?? 1;
    this.out = this.addOutput('out');
    this.out.write(this.value);
  }

  step(_dt: number): void {
    this.out.write(this.value);
  }

  reset(): void {
    this.out.write(this.value);
  }

  params(): ParamRecord {
    return { value: this.value };
  }
}
