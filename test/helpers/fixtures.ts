import type { ComparisonResult } from '../../simulation/types/simulation.js';

export function sampleComparison(): ComparisonResult {
  return {
    config: {
      numDevices: 4,
      numSlots: 10,
      minCW: 2,
      maxCW: 8,
      numPreambles: 2,
      algorithms: ['BEB', 'Adaptive'],
      seed: 1,
    },
    results: [
      {
        algorithm: 'BEB',
        metrics: { throughput: 0.3, fairnessIndex: 0.75, avgAccessDelay: 4.5, collisionProbability: 0.2 },
        counters: { successes: 3, collisions: 2, idleSlots: 5 },
      },
      {
        algorithm: 'Adaptive',
        metrics: { throughput: 0, fairnessIndex: 0, avgAccessDelay: Number.NaN, collisionProbability: 0.6 },
        counters: { successes: 0, collisions: 6, idleSlots: 4 },
      },
    ],
  };
}
