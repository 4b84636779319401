export { parsePortRef, formatPortRef, type ParsedPortRef, type RefSplit } from './port-ref.js';
export {
  CircuitBuilder,
  buildCircuit,
  type BuildOptions,
  type BuiltCircuit,
} from './builder.js';
export { saveCircuit, type SaveOptions } from './saver.js';
export {
  parseCircuit,
  parseSubcircuitDef,
  loadCircuitFile,
  loadSubcircuitFile,
  serializeCircuit,
  writeCircuitFile,
} from './document.js';
