// Single-query attention head: out = (q · k) * v

import type { SubcircuitDef } from '../types/circuit.js';

export function createAttentionHeadDef(): SubcircuitDef {
  return {
    name: 'AttentionHead',
    description: 'Single-query attention: output = (q · k) * v',
    inputs: ['q0', 'q1', 'k0', 'k1', 'v'],
    outputs: ['out'],
    components: [
      { name: 'DOT', type: 'DotProduct', params: { size: 2 } },
      // Unit weight for now; a multi-key version would normalize here
      { name: 'WEIGHT', type: 'Coefficient', params: { k: 1 } },
      { name: 'MUL', type: 'Multiplier' },
    ],
    patches: [
      ['DOT.out', 'WEIGHT.in'],
      ['WEIGHT.out', 'MUL.x'],
    ],
    input_map: {
      q0: 'DOT.a0',
      q1: 'DOT.a1',
      k0: 'DOT.b0',
      k1: 'DOT.b1',
      v: 'MUL.y',
    },
    output_map: {
      out: 'MUL.out',
    },
  };
}
