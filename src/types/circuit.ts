// Declarative circuit schema: what circuit files and the saver exchange

// A breakpoint for PiecewiseLinear: [x, y]
export type Point = [number, number];

export type ParamValue = number | number[] | Point[];

export type ParamRecord = Record<string, ParamValue>;

// "componentName.portName"
export type PortRef = string;

// [source, dest]
export type PatchDecl = [PortRef, PortRef];

export interface ComponentDecl {
  name: string;
  type: string;
  params?: ParamRecord;
}

export interface ChannelDecl {
  source: PortRef;
  label?: string;
}

export interface ScopeDecl {
  channels: ChannelDecl[];
}

// A reusable circuit block (macro)
export interface SubcircuitDef {
  name: string;
  description?: string;
  inputs: string[];
  outputs: string[];
  components: ComponentDecl[];
  patches: PatchDecl[];
  // External port name -> "local.port"
  input_map?: Record<string, PortRef>;
  output_map?: Record<string, PortRef>;
}

export interface CircuitDecl {
  name: string;
  description?: string;
  components: ComponentDecl[];
  patches: PatchDecl[];
  scope?: ScopeDecl;
  subcircuits?: Record<string, SubcircuitDef>;
  imports?: string[];
}
