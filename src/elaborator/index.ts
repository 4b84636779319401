export {
  instantiateSubcircuit,
  SubcircuitComponent,
  type ExposedPorts,
  type Instantiation,
} from './subcircuit.js';
