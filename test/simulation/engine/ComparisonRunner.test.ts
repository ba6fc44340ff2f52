import { describe, expect, it } from 'vitest';
import { runComparison } from '../../../simulation/engine/ComparisonRunner.js';
import { SimulationConfigError } from '../../../simulation/engine/validation.js';
import type { SimulationConfig } from '../../../simulation/types/simulation.js';

const config: SimulationConfig = {
  numDevices: 50,
  numSlots: 400,
  minCW: 8,
  maxCW: 256,
  numPreambles: 4,
  algorithms: ['BEB', 'LILD', 'Adaptive'],
  seed: 31,
};

describe('runComparison', () => {
  it('returns one result per algorithm in config order', () => {
    const comparison = runComparison({ ...config, algorithms: ['Adaptive', 'BEB'] });

    expect(comparison.results.map((result) => result.algorithm)).toEqual(['Adaptive', 'BEB']);
    expect(comparison.config.algorithms).toEqual(['Adaptive', 'BEB']);
  });

  it('gives an algorithm the same result regardless of its companions', () => {
    const alone = runComparison({ ...config, algorithms: ['LILD'] });
    const mixed = runComparison({ ...config, algorithms: ['Adaptive', 'LILD'] });

    expect(mixed.results[1]).toEqual(alone.results[0]);
  });

  it('is deterministic for a fixed seed', () => {
    expect(runComparison(config)).toEqual(runComparison(config));
  });

  it('refuses a seed that would alias a smaller one', () => {
    expect(() => runComparison({ ...config, seed: 2 ** 32 + 1 })).toThrow('seed must be a 32-bit integer');
  });

  it('fails before running anything when the config is invalid', () => {
    expect(() => runComparison({ ...config, numPreambles: 0 })).toThrow(SimulationConfigError);
  });

  it('forwards forced initial timers to every run', () => {
    const comparison = runComparison(
      { numDevices: 2, numSlots: 1, minCW: 2, maxCW: 2, numPreambles: 1, algorithms: ['BEB', 'LILD', 'Adaptive'], seed: 4 },
      { initialBackoffTimers: [0, 0] },
    );

    expect(comparison.results.map((result) => result.counters.collisions)).toEqual([1, 1, 1]);
  });
});
