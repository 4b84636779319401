import type { ComponentRegistry } from '../registry/registry.js';
import { createSoftmaxDef } from './softmax.js';
import { createAttentionHeadDef } from './attention.js';

export { createSoftmaxDef, createAttentionHeadDef };

export function registerBuiltinSubcircuits(registry: ComponentRegistry): void {
  registry.register('Softmax', createSoftmaxDef());
  registry.register('AttentionHead', createAttentionHeadDef());
}
