import { describe, it, expect } from 'vitest';
import { isRecord } from '../guards.js';

describe('isRecord', () => {
  it('accepts plain objects only', () => {
    expect(isRecord({ modules: [] })).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('modules')).toBe(false);
  });
});
