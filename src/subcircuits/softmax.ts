// Softmax over two inputs: out_i = exp(in_i) / (exp(in0) + exp(in1))

import type { SubcircuitDef } from '../types/circuit.js';

/**
 * Three serial stages (Exp -> Summer -> Divider), so an input change needs
 * three propagate/step cycles to reach the outputs.
 */
export function createSoftmaxDef(): SubcircuitDef {
  return {
    name: 'Softmax',
    description: 'Softmax normalization for 2 inputs: exp(x_i) / sum(exp(x_j))',
    inputs: ['in0', 'in1'],
    outputs: ['out0', 'out1'],
    components: [
      { name: 'EXP0', type: 'Exp' },
      { name: 'EXP1', type: 'Exp' },
      { name: 'SUM', type: 'Summer', params: { weights: [1, 1] } },
      { name: 'DIV0', type: 'Divider' },
      { name: 'DIV1', type: 'Divider' },
    ],
    patches: [
      ['EXP0.out', 'SUM.in0'],
      ['EXP1.out', 'SUM.in1'],
      ['EXP0.out', 'DIV0.num'],
      ['SUM.out', 'DIV0.den'],
      ['EXP1.out', 'DIV1.num'],
      ['SUM.out', 'DIV1.den'],
    ],
    input_map: {
      in0: 'EXP0.in',
      in1: 'EXP1.in',
    },
    output_map: {
      out0: 'DIV0.out',
      out1: 'DIV1.out',
    },
  };
}
