import { describe, expect, it } from 'vitest';
import { executeRun } from '../../server/services/comparison.js';
import type { SimulationConfig } from '../../server/types.js';

describe('executeRun', () => {
  it('wraps a comparison with a fresh id and timestamp', () => {
    const config: SimulationConfig = {
      numDevices: 3,
      numSlots: 20,
      minCW: 2,
      maxCW: 8,
      numPreambles: 2,
      algorithms: ['BEB', 'LILD'],
      seed: 5
    };

    const first = executeRun(config, () => 1_700_000_000_000);
    const second = executeRun(config, () => 1_700_000_000_000);

    expect(first.createdAt).toBe(1_700_000_000_000);
    expect(first.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(first.runId).not.toBe(second.runId);
    expect(second.comparison).toEqual(first.comparison);
  });
});
