// Periodic wave generators and the piecewise-linear function generator

import { PrimitiveComponent, phaseOf } from './component.js';
import type { Port } from '../simulator/signal.js';
import type { ParamRecord, Point } from '../types/circuit.js';

export interface WaveOptions {
  frequency: number;
  amplitude?: number;
}

abstract class Oscillator extends PrimitiveComponent {
  readonly frequency: number;
  readonly amplitude: number;
  protected time: number = 0;
  protected readonly out: Port;

  constructor(name: string, options: WaveOptions) {
    super(name);
    this.frequency = options.frequency;
    this.amplitude = options.amplitude ?? 1;
    this.out = this.addOutput('out');
  }

  step(dt: number): void {
    this.time += dt;
    this.out.write(this.waveform(phaseOf(this.frequency, this.time)));
  }

  reset(): void {
    this.time = 0;
    this.out.write(this.restValue());
  }

  params(): ParamRecord {
    return { frequency: this.frequency, amplitude: this.amplitude };
  }

  protected abstract waveform(phase: number): number;
  protected abstract restValue(): number;
}

/**
 * Rises from -amplitude to +amplitude over the first half period, then falls
 */
export class TriangleWave extends Oscillator {
  readonly type = 'TriangleWave' as const;

  protected waveform(phase: number): number {
    const value = phase < 0.5 ? -1 + 4 * phase : 3 - 4 * phase;
    return this.amplitude * value;
  }

  protected restValue(): number {
    return -this.amplitude;
  }
}

export class SawtoothWave extends Oscillator {
  readonly type = 'SawtoothWave' as const;

  protected waveform(phase: number): number {
    return this.amplitude * (-1 + 2 * phase);
  }

  protected restValue(): number {
    return -this.amplitude;
  }
}

export interface SquareWaveOptions extends WaveOptions {
  duty_cycle?: number;
}

export class SquareWave extends Oscillator {
  readonly type = 'SquareWave' as const;
  readonly dutyCycle: number;

  constructor(name: string, options: SquareWaveOptions) {
    super(name, options);
    this.dutyCycle = options.duty_cycle ?? 0.5;
  }

  protected waveform(phase: number): number {
    return phase < this.dutyCycle ? this.amplitude : -this.amplitude;
  }

  protected restValue(): number {
    return this.amplitude;
  }

  params(): ParamRecord {
    return { ...super.params(), duty_cycle: this.dutyCycle };
  }
}

export interface PiecewiseLinearOptions {
  breakpoints?: Point[];
}

/**
 * Maps its input through a table of (x, y) breakpoints. Outside the table the
 * output holds the first or last y.
 */
export class PiecewiseLinear extends PrimitiveComponent {
  readonly type = 'PiecewiseLinear' as const;
  readonly breakpoints: Point[];
  private readonly input: Port;
  private readonly out: Port;

  constructor(name: string, options: PiecewiseLinearOptions = {}) {
    super(name);
    const points = options.breakpoints ?? [[-1, -1], [1, 1]];
    this.breakpoints = points
      .map((p): Point => [p[0], p[1]])
      .sort((a, b) => a[0] - b[0]);
    this.input = this.addInput('in');
    this.out = this.addOutput('out');
  }

  step(_dt: number): void {
    this.out.write(this.interpolate(this.input.read()));
  }

  reset(): void {
    this.out.write(0);
  }

  params(): ParamRecord {
    return { breakpoints: this.breakpoints.map((p): Point => [p[0], p[1]]) };
  }

  interpolate(x: number): number {
    const points = this.breakpoints;
    if (points.length === 0) {
      return 0;
    }
    const first = points[0];
    const last = points[points.length - 1];
    if (x <= first[0]) {
      return first[1];
    }
    if (x >= last[0]) {
      return last[1];
    }

    for (let i = 0; i < points.length - 1; i++) {
      const [x1, y1] = points[i];
      const [x2, y2] = points[i + 1];
      if (x1 <= x && x <= x2) {
        // Vertical step between repeated x values
        if (x2 === x1) {
          return y2;
        }
        const t = (x - x1) / (x2 - x1);
        return y1 + t * (y2 - y1);
      }
    }

    return last[1];
  }
}
