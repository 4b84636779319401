export { Signal, Port, type PortId, type PortMap, type PortDirection } from './signal.js';
export { PatchBay, createPatchBay, type Connection } from './patch-bay.js';
export { Machine, createMachine, DEFAULT_DT } from './machine.js';
export {
  Simulator,
  type SimulatorOptions,
  type ScopeSample,
  type ChannelStats,
} from './simulator.js';
