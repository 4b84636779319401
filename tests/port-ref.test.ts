// Tests for port reference parsing

import { describe, it, expect } from 'vitest';
import { formatPortRef, parsePortRef } from '../src/circuit/port-ref.js';
import { MalformedReferenceError } from '../src/types/errors.js';

describe('parsePortRef', () => {
  it('should split a simple reference', () => {
    expect(parsePortRef('INT1.out')).toEqual({ component: 'INT1', port: 'out' });
  });

  it('should split at the last dot by default', () => {
    expect(parsePortRef('outer.inner.leaf.out')).toEqual({
      component: 'outer.inner.leaf',
      port: 'out',
    });
  });

  it('should split at the first dot when asked', () => {
    expect(parsePortRef('SUM.in0', 'first')).toEqual({ component: 'SUM', port: 'in0' });
    expect(parsePortRef('A.b.c', 'first')).toEqual({ component: 'A', port: 'b.c' });
  });

  it('should reject references without a usable dot', () => {
    for (const ref of ['INT1', '.out', 'INT1.', '']) {
      expect(() => parsePortRef(ref)).toThrow(MalformedReferenceError);
    }
  });

  it('should name the expected format in the error', () => {
    expect(() => parsePortRef('INT1')).toThrow(
      "Invalid port reference 'INT1'. Expected format: 'component_name.port_name'"
    );
  });
});

describe('formatPortRef', () => {
  it('should join component and port', () => {
    expect(formatPortRef('SM.SUM', 'out')).toBe('SM.SUM.out');
  });
});
