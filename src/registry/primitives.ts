// Primitive catalog: parameter signatures and factories

import {
  VoltageSource,
  Constant,
  TriangleWave,
  SawtoothWave,
  SquareWave,
  PiecewiseLinear,
  Integrator,
  Summer,
  Coefficient,
  Inverter,
  Multiplier,
  Comparator,
  Limiter,
  Exp,
  Divider,
  DotProduct,
  Max,
  type Primitive,
  type PrimitiveType,
} from '../components/index.js';
import type { ParamRecord, ParamValue, Point } from '../types/circuit.js';
import { InvalidParamsError } from '../types/errors.js';

export type ParamKind = 'number' | 'integer' | 'numbers' | 'points';

export interface PrimitiveSpec {
  params: Record<string, ParamKind>;
  required?: string[];
  create(name: string, params: ParamRecord): Primitive;
}

function num(params: ParamRecord, key: string): number | undefined {
  const value = params[key];
  return typeof value === 'number' ? value : undefined;
}

function numbers(params: ParamRecord, key: string): number[] | undefined {
  const value = params[key];
  return isNumberList(value) ? value : undefined;
}

function points(params: ParamRecord, key: string): Point[] | undefined {
  const value = params[key];
  return isPointList(value) ? value : undefined;
}

// For parameters listed as required
function requiredNum(params: ParamRecord, key: string, type: string): number {
  const value = num(params, key);
  if (value === undefined) {
    throw new InvalidParamsError(type, `missing required parameter '${key}'`);
  }
  return value;
}

function isNumberList(value: ParamValue | undefined): value is number[] {
  if (!Array.isArray(value)) return false;
  const items: unknown[] = value;
  return items.every((item) => typeof item === 'number');
}

function isPointList(value: ParamValue | undefined): value is Point[] {
  if (!Array.isArray(value)) return false;
  const items: unknown[] = value;
  return items.every(
    (item) =>
      Array.isArray(item) &&
      item.length === 2 &&
      typeof item[0] === 'number' &&
      typeof item[1] === 'number'
  );
}

function matchesKind(value: ParamValue, kind: ParamKind): boolean {
  switch (kind) {
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value) && value >= 0;
    case 'numbers':
      return isNumberList(value);
    case 'points':
      return isPointList(value);
  }
}

const KIND_LABELS: Record<ParamKind, string> = {
  number: 'a number',
  integer: 'a non-negative integer',
  numbers: 'a list of numbers',
  points: 'a list of [x, y] pairs',
};

const WAVE_PARAMS: Record<string, ParamKind> = { frequency: 'number', amplitude: 'number' };

export const PRIMITIVES: Record<PrimitiveType, PrimitiveSpec> = {
  VoltageSource: {
    params: WAVE_PARAMS,
    required: ['frequency'],
    create: (name, p) =>
      new VoltageSource(name, {
        frequency: requiredNum(p, 'frequency', 'VoltageSource'),
        amplitude: num(p, 'amplitude'),
      }),
  },
  TriangleWave: {
    params: WAVE_PARAMS,
    required: ['frequency'],
    create: (name, p) =>
      new TriangleWave(name, {
        frequency: requiredNum(p, 'frequency', 'TriangleWave'),
        amplitude: num(p, 'amplitude'),
      }),
  },
  SawtoothWave: {
    params: WAVE_PARAMS,
    required: ['frequency'],
    create: (name, p) =>
      new SawtoothWave(name, {
        frequency: requiredNum(p, 'frequency', 'SawtoothWave'),
        amplitude: num(p, 'amplitude'),
      }),
  },
  SquareWave: {
    params: { ...WAVE_PARAMS, duty_cycle: 'number' },
    required: ['frequency'],
    create: (name, p) =>
      new SquareWave(name, {
        frequency: requiredNum(p, 'frequency', 'SquareWave'),
        amplitude: num(p, 'amplitude'),
        duty_cycle: num(p, 'duty_cycle'),
      }),
  },
  Integrator: {
    params: { initial: 'number', gain: 'number' },
    create: (name, p) =>
      new Integrator(name, { initial: num(p, 'initial'), gain: num(p, 'gain') }),
  },
  Summer: {
    params: { weights: 'numbers' },
    create: (name, p) => new Summer(name, { weights: numbers(p, 'weights') }),
  },
  Coefficient: {
    params: { k: 'number' },
    create: (name, p) => new Coefficient(name, { k: num(p, 'k') }),
  },
  Inverter: {
    params: {},
    create: (name) => new Inverter(name),
  },
  Multiplier: {
    params: { scale: 'number' },
    create: (name, p) => new Multiplier(name, { scale: num(p, 'scale') }),
  },
  Comparator: {
    params: { threshold: 'number', high: 'number', low: 'number' },
    create: (name, p) =>
      new Comparator(name, {
        threshold: num(p, 'threshold'),
        high: num(p, 'high'),
        low: num(p, 'low'),
      }),
  },
  Limiter: {
    params: { min_val: 'number', max_val: 'number' },
    create: (name, p) =>
      new Limiter(name, { min_val: num(p, 'min_val'), max_val: num(p, 'max_val') }),
  },
  Exp: {
    params: { scale: 'number' },
    create: (name, p) => new Exp(name, { scale: num(p, 'scale') }),
  },
  Divider: {
    params: { epsilon: 'number' },
    create: (name, p) => new Divider(name, { epsilon: num(p, 'epsilon') }),
  },
  DotProduct: {
    params: { size: 'integer' },
    create: (name, p) => new DotProduct(name, { size: num(p, 'size') }),
  },
  Max: {
    params: { size: 'integer' },
    create: (name, p) => new Max(name, { size: num(p, 'size') }),
  },
  Constant: {
    params: { value: 'number' },
    create: (name, p) => new Constant(name, { value: num(p, 'value') }),
  },
  PiecewiseLinear: {
    params: { breakpoints: 'points' },
    create: (name, p) => new PiecewiseLinear(name, { breakpoints: points(p, 'breakpoints') }),
  },
};

export function isPrimitiveType(name: string): name is PrimitiveType {
  return Object.prototype.hasOwnProperty.call(PRIMITIVES, name);
}

/**
 * Reject unknown names, missing required names and values of the wrong kind
 */
export function validateParams(type: PrimitiveType, params: ParamRecord): void {
  const spec = PRIMITIVES[type];

  for (const [key, value] of Object.entries(params)) {
    const kind = Object.prototype.hasOwnProperty.call(spec.params, key)
      ? spec.params[key]
      : undefined;
    if (kind === undefined) {
      const accepted = Object.keys(spec.params);
      throw new InvalidParamsError(
        type,
        accepted.length > 0
          ? `unexpected parameter '${key}' (accepts: ${accepted.join(', ')})`
          : `unexpected parameter '${key}' (takes no parameters)`
      );
    }
    if (!matchesKind(value, kind)) {
      throw new InvalidParamsError(type, `'${key}' must be ${KIND_LABELS[kind]}`);
    }
  }

  for (const key of spec.required ?? []) {
    if (!Object.prototype.hasOwnProperty.call(params, key)) {
      throw new InvalidParamsError(type, `missing required parameter '${key}'`);
    }
  }
}
