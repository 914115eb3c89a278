import { describe, it, expect } from 'vitest';
import { mapSeverity, DEFAULT_SEVERITY } from '../../src/domain/index.js';

describe('mapSeverity', () => {
  it('maps host states to up or down', () => {
    expect(mapSeverity('host', 0)).toBe(0);
    expect(mapSeverity('host', 1)).toBe(1);
    expect(mapSeverity('host', 2)).toBe(1);
  });

  it('maps service states through the alerting scale', () => {
    expect(mapSeverity('service', 0)).toBe(0);
    expect(mapSeverity('service', 1)).toBe(3);
    expect(mapSeverity('service', 2)).toBe(1);
    expect(mapSeverity('service', 3)).toBe(4);
  });

  it('falls back to the default severity', () => {
    expect(mapSeverity('service', 7)).toBe(DEFAULT_SEVERITY);
    expect(mapSeverity('service', undefined)).toBe(5);
    expect(mapSeverity('host', undefined)).toBe(5);
  });
});
