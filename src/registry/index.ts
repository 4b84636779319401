import { ComponentRegistry } from './registry.js';
import { registerBuiltinSubcircuits } from '../subcircuits/index.js';

export {
  ComponentRegistry,
  type BuildContext,
  type SubcircuitTemplate,
} from './registry.js';
export {
  PRIMITIVES,
  isPrimitiveType,
  validateParams,
  type ParamKind,
  type PrimitiveSpec,
} from './primitives.js';

/**
 * A fresh registry with the primitives and the built-in subcircuits
 */
export function createDefaultRegistry(): ComponentRegistry {
  const registry = new ComponentRegistry();
  registerBuiltinSubcircuits(registry);
  return registry;
}
