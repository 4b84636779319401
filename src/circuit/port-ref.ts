// "component.port" reference parsing

import { MalformedReferenceError } from '../types/errors.js';

export interface ParsedPortRef {
  component: string;
  port: string;
}

/**
 * Which dot separates the component from the port.
 *
 * 'last' is for circuit-level references, whose component part may itself be
 * dotted (`outer.inner.leaf.out` names port `out` of `outer.inner.leaf`).
 * 'first' is for references inside a subcircuit template, which only name
 * local components (`SUM.in0`).
 */
export type RefSplit = 'first' | 'last';

export function parsePortRef(ref: string, split: RefSplit = 'last'): ParsedPortRef {
  const index = split === 'first' ? ref.indexOf('.') : ref.lastIndexOf('.');
  if (index <= 0 || index === ref.length - 1) {
    throw new MalformedReferenceError(ref);
  }
  return { component: ref.slice(0, index), port: ref.slice(index + 1) };
}

export function formatPortRef(component: string, port: string): string {
  return `${component}.${port}`;
}
