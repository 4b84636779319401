// Stateless arithmetic components. Each one recomputes its output from the
// current input values on every step and writes 0 on reset unless noted.

import { PrimitiveComponent, clamp } from './component.js';
import type { Port } from '../simulator/signal.js';
import type { ParamRecord } from '../types/circuit.js';

const EXP_LIMIT = 10;

abstract class UnaryComponent extends PrimitiveComponent {
  protected readonly input: Port;
  protected readonly out: Port;

  constructor(name: string) {
    super(name);
    this.input = this.addInput('in');
    this.out = this.addOutput('out');
  }

  step(_dt: number): void {
    this.out.write(this.apply(this.input.read()));
  }

  reset(): void {
    this.out.write(0);
  }

  protected abstract apply(value: number): number;
}

export interface SummerOptions {
  weights?: number[];
}

/**
 * Weighted sum with one input (in0..inN-1) per weight
 */
export class Summer extends PrimitiveComponent {
  readonly type = 'Summer' as const;
  readonly weights: number[];
  private readonly terms: Port[];
  private readonly out: Port;

  constructor(name: string, options: SummerOptions = {}) {
    super(name);
    this.weights = [...(options.weights ?? [1, 1])];
    this.terms = this.weights.map((_, i) => this.addInput(`in${i}`));
    this.out = this.addOutput('out');
  }

  step(_dt: number): void {
    let sum = 0;
    for (let i = 0; i < this.weights.length; i++) {
      sum += this.terms[i].read() * this.weights[i];
    }
    this.out.write(sum);
  }

  reset(): void {
    this.out.write(0);
  }

  params(): ParamRecord {
    return { weights: [...this.weights] };
  }
}

export interface CoefficientOptions {
  k?: number;
}

// The "pot": multiply by a constant
export class Coefficient extends UnaryComponent {
  readonly type = 'Coefficient' as const;
  readonly k: number;

  constructor(name: string, options: CoefficientOptions = {}) {
    super(name);
    this.k = options.k ?? 1;
  }

  protected apply(value: number): number {
    return value * this.k;
  }

  params(): ParamRecord {
    return { k: this.k };
  }
}

export class Inverter extends UnaryComponent {
  readonly type = 'Inverter' as const;

  protected apply(value: number): number {
    return -value;
  }

  params(): ParamRecord {
    return {};
  }
}

export interface MultiplierOptions {
  scale?: number;
}

// Four-quadrant multiplier: out = x * y * scale
export class Multiplier extends PrimitiveComponent {
  readonly type = 'Multiplier' as const;
  readonly scale: number;
  private readonly x: Port;
  private readonly y: Port;
  private readonly out: Port;

  constructor(name: string, options: MultiplierOptions = {}) {
    super(name);
    this.scale = options.scale ?? 1;
    this.x = this.addInput('x');
    this.y = this.addInput('y');
    this.out = this.addOutput('out');
  }

  step(_dt: number): void {
    this.out.write(this.x.read() * this.y.read() * this.scale);
  }

  reset(): void {
    this.out.write(0);
  }

  params(): ParamRecord {
    return { scale: this.scale };
  }
}

export interface ComparatorOptions {
  threshold?: number;
  high?: number;
  low?: number;
}

export class Comparator extends UnaryComponent {
  readonly type = 'Comparator' as const;
  readonly threshold: number;
  readonly high: number;
  readonly low: number;

  constructor(name: string, options: ComparatorOptions = {}) {
    super(name);
    this.threshold = options.threshold ?? 0;
    this.high = options.high ?? 1;
    this.low = options.low ?? -1;
  }

  protected apply(value: number): number {
    return value >= this.threshold ? this.high : this.low;
  }

  params(): ParamRecord {
    return { threshold: this.threshold, high: this.high, low: this.low };
  }
}

export interface LimiterOptions {
  min_val?: number;
  max_val?: number;
}

export class Limiter extends UnaryComponent {
  readonly type = 'Limiter' as const;
  readonly min: number;
  readonly max: number;

  constructor(name: string, options: LimiterOptions = {}) {
    super(name);
    this.min = options.min_val ?? -1;
    this.max = options.max_val ?? 1;
  }

  protected apply(value: number): number {
    return clamp(value, this.min, this.max);
  }

  params(): ParamRecord {
    return { min_val: this.min, max_val: this.max };
  }
}

export interface ExpOptions {
  scale?: number;
}

/**
 * out = exp(clamp(in * scale, -10, 10)); resets to exp(0) = 1
 */
export class Exp extends UnaryComponent {
  readonly type = 'Exp' as const;
  readonly scale: number;

  constructor(name: string, options: ExpOptions = {}) {
    super(name);
    this.scale = options.scale ?? 1;
  }

  protected apply(value: number): number {
    return Math.exp(clamp(value * this.scale, -EXP_LIMIT, EXP_LIMIT));
  }

  reset(): void {
    this.out.write(1);
  }

  params(): ParamRecord {
    return { scale: this.scale };
  }
}

export interface DividerOptions {
  epsilon?: number;
}

/**
 * out = num / max(|den|, epsilon), signed by den (den = 0 counts as positive)
 */
export class Divider extends PrimitiveComponent {
  readonly type = 'Divider' as const;
  readonly epsilon: number;
  private readonly num: Port;
  private readonly den: Port;
  private readonly out: Port;

  constructor(name: string, options: DividerOptions = {}) {
    super(name);
    this.epsilon = options.epsilon ?? 1e-6;
    this.num = this.addInput('num');
    this.den = this.addInput('den');
    this.out = this.addOutput('out');
  }

  step(_dt: number): void {
    const den = this.den.read();
    const safe = Math.max(Math.abs(den), this.epsilon);
    const sign = den >= 0 ? 1 : -1;
    this.out.write((this.num.read() / safe) * sign);
  }

  reset(): void {
    this.out.write(0);
  }

  params(): ParamRecord {
    return { epsilon: this.epsilon };
  }
}

export interface SizeOptions {
  size?: number;
}

// Inputs a0..aN-1 then b0..bN-1
export class DotProduct extends PrimitiveComponent {
  readonly type = 'DotProduct' as const;
  readonly size: number;
  private readonly a: Port[] = [];
  private readonly b: Port[] = [];
  private readonly out: Port;

  constructor(name: string, options: SizeOptions = {}) {
    super(name);
    this.size = options.size ?? 4;
    for (let i = 0; i < this.size; i++) {
      this.a.push(this.addInput(`a${i}`));
    }
    for (let i = 0; i < this.size; i++) {
      this.b.push(this.addInput(`b${i}`));
    }
    this.out = this.addOutput('out');
  }

  step(_dt: number): void {
    let sum = 0;
    for (let i = 0; i < this.size; i++) {
      sum += this.a[i].read() * this.b[i].read();
    }
    this.out.write(sum);
  }

  reset(): void {
    this.out.write(0);
  }

  params(): ParamRecord {
    return { size: this.size };
  }
}

export class Max extends PrimitiveComponent {
  readonly type = 'Max' as const;
  readonly size: number;
  private readonly terms: Port[] = [];
  private readonly out: Port;

  constructor(name: string, options: SizeOptions = {}) {
    super(name);
    this.size = options.size ?? 2;
    for (let i = 0; i < this.size; i++) {
      this.terms.push(this.addInput(`in${i}`));
    }
    this.out = this.addOutput('out');
  }

  step(_dt: number): void {
    // No inputs: 0 rather than -Infinity
    if (this.terms.length === 0) {
      this.out.write(0);
      return;
    }
    this.out.write(Math.max(...this.terms.map((p) => p.read())));
  }

  reset(): void {
    this.out.write(0);
  }

  params(): ParamRecord {
    return { size: this.size };
  }
}
