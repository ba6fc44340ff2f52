import { runComparison } from '../../simulation/engine/ComparisonRunner.js';
import type { SimulationConfig, StoredRun } from '../types.js';
import { generateId } from '../../simulation/utils/id.js';

export function executeRun(config: SimulationConfig, now: () => number = Date.now): StoredRun {
  const comparison = runComparison(config);
  return {
    runId: generateId(),
    createdAt: now(),
    comparison
  };
}
