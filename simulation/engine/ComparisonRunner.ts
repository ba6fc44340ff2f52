import { ALGORITHMS, type ComparisonResult, type SimulationConfig } from '../types/simulation.js';
import { deriveSeed } from '../utils/rng.js';
import { SimulationEngine } from './SimulationEngine.js';
import { validateSimulationConfig } from './validation.js';

export interface ComparisonOptions {
  initialBackoffTimers?: readonly number[];
}

// Runs every configured algorithm on its own engine and seed stream; results keep config order.
// The stream index comes from the algorithm's canonical position, not its place in the config.
export function runComparison(config: SimulationConfig, options: ComparisonOptions = {}): ComparisonResult {
  validateSimulationConfig(config);
  const { algorithms, seed, ...channel } = config;

  const engines = algorithms.map(
    (algorithm) =>
      new SimulationEngine(algorithm, channel, {
        seed: deriveSeed(seed, ALGORITHMS.indexOf(algorithm)),
        initialBackoffTimers: options.initialBackoffTimers,
      }),
  );

  return {
    config,
    results: engines.map((engine) => engine.run()),
  };
}
