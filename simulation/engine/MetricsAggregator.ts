import type { RunCounters, RunMetrics } from '../types/simulation.js';

// Jain's index over per-device successful transmissions; 0 when nobody transmitted.
export function jainFairnessIndex(counts: readonly number[]): number {
  if (counts.length === 0) {
    return 0;
  }
  let sum = 0;
  let sumOfSquares = 0;
  for (const count of counts) {
    sum += count;
    sumOfSquares += count * count;
  }
  if (sumOfSquares === 0) {
    return 0;
  }
  return (sum * sum) / (counts.length * sumOfSquares);
}

// Mean delay over devices that succeeded at least once; NaN when none did.
export function averageAccessDelay(transmissionCounts: readonly number[], cumulativeDelays: readonly number[]): number {
  let total = 0;
  let contributors = 0;
  transmissionCounts.forEach((count, index) => {
    if (count > 0) {
      total += cumulativeDelays[index] ?? 0;
      contributors += 1;
    }
  });
  return contributors === 0 ? Number.NaN : total / contributors;
}

export class MetricsAggregator {
  computeMetrics(params: {
    counters: RunCounters;
    numSlots: number;
    transmissionCounts: readonly number[];
    cumulativeDelays: readonly number[];
  }): RunMetrics {
    const { counters, numSlots, transmissionCounts, cumulativeDelays } = params;

    return {
      throughput: counters.successes / numSlots,
      fairnessIndex: jainFairnessIndex(transmissionCounts),
      avgAccessDelay: averageAccessDelay(transmissionCounts, cumulativeDelays),
      collisionProbability: counters.collisions / numSlots,
    };
  }
}
