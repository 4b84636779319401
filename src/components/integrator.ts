// Integrator: the heart of analog computation

import { PrimitiveComponent } from './component.js';
import type { Port } from '../simulator/signal.js';
import type { ParamRecord } from '../types/circuit.js';

export interface IntegratorOptions {
  initial?: number;
  gain?: number;
}

/**
 * Forward-Euler integration: state += in * gain * dt.
 *
 * The output holds the initial value from construction on, so a freshly built
 * circuit can read it before the first step.
 */
export class Integrator extends PrimitiveComponent {
  readonly type = 'Integrator' as const;
  readonly initial: number;
  readonly gain: number;
  private state: number;
  private readonly input: Port;
  private readonly out: Port;

  constructor(name: string, options: IntegratorOptions = {}) {
    super(name);
    this.initial = options.initial ?? 0;
    this.gain = options.gain ?? 1;
    this.state = this.initial;
    this.input = this.addInput('in');
    this.out = this.addOutput('out');
    this.out.write(this.state);
  }

  get value(): number {
    return this.state;
  }

  step(dt: number): void {
    this.state += this.input.read() * this.gain * dt;
    this.out.write(this.state);
  }

  reset(): void {
    this.state = this.initial;
    this.out.write(this.state);
  }

  params(): ParamRecord {
    return { initial: this.initial, gain: this.gain };
  }
}
