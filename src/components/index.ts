export { PrimitiveComponent, clamp, phaseOf, type Component } from './component.js';
export { VoltageSource, Constant } from './sources.js';
export { TriangleWave, SawtoothWave, SquareWave, PiecewiseLinear } from './generators.js';
export { Integrator } from './integrator.js';
export {
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
} from './math.js';

import type { VoltageSource, Constant } from './sources.js';
import type { TriangleWave, SawtoothWave, SquareWave, PiecewiseLinear } from './generators.js';
import type { Integrator } from './integrator.js';
import type {
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
} from './math.js';

// The closed set of primitives, discriminated by `type`
export type Primitive =
  | VoltageSource
  | TriangleWave
  | SawtoothWave
  | SquareWave
  | Integrator
  | Summer
  | Coefficient
  | Inverter
  | Multiplier
  | Comparator
  | Limiter
  | Exp
  | Divider
  | DotProduct
  | Max
  | Constant
  | PiecewiseLinear;

export type PrimitiveType = Primitive['type'];
