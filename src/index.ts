// Analog Patch - patch-programmable analog computer emulator
// Components, patch bay, machine, registry and subcircuit elaboration

// Signals, patch bay, clock and driver
export * from './simulator/index.js';

// Component library
export * from './components/index.js';

// Registry and built-in subcircuits
export * from './registry/index.js';
export {
  createSoftmaxDef,
  createAttentionHeadDef,
  registerBuiltinSubcircuits,
} from './subcircuits/index.js';

// Subcircuit elaboration
export * from './elaborator/index.js';

// Circuit documents, building and saving
export * from './circuit/index.js';

// Schema and errors
export type {
  CircuitDecl,
  ComponentDecl,
  ChannelDecl,
  ScopeDecl,
  SubcircuitDef,
  PatchDecl,
  PortRef,
  ParamRecord,
  ParamValue,
  Point,
} from './types/circuit.js';
export * from './types/errors.js';
