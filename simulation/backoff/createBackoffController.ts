import type { AlgorithmName } from '../types/simulation.js';
import type { Rng } from '../utils/rng.js';
import { AdaptiveBackoff } from './AdaptiveBackoff.js';
import type { BaseBackoffController, WindowBounds } from './BaseBackoffController.js';
import { BinaryExponentialBackoff } from './BinaryExponentialBackoff.js';
import { LinearBackoff } from './LinearBackoff.js';

export function createBackoffController(algorithm: AlgorithmName, bounds: WindowBounds, rng: Rng): BaseBackoffController {
  switch (algorithm) {
    case 'BEB':
      return new BinaryExponentialBackoff(bounds, rng);
    case 'LILD':
      return new LinearBackoff(bounds, rng);
    case 'Adaptive':
      return new AdaptiveBackoff(bounds, rng);
    default:
      throw new Error(`Unsupported backoff algorithm: ${String(algorithm)}`);
  }
}
