export type {
  AlgorithmName,
  AlgorithmResult,
  ChannelConfig,
  ComparisonResult,
  Device,
  DeviceState,
  RunCounters,
  RunMetrics,
  SimulationConfig,
  SlotOutcome,
} from './types/simulation.js';
export { ALGORITHMS } from './types/simulation.js';
export { BaseBackoffController, type WindowBounds } from './backoff/BaseBackoffController.js';
export { BinaryExponentialBackoff } from './backoff/BinaryExponentialBackoff.js';
export { LinearBackoff } from './backoff/LinearBackoff.js';
export { AdaptiveBackoff } from './backoff/AdaptiveBackoff.js';
export { createBackoffController } from './backoff/createBackoffController.js';
export { DeviceStateStore } from './engine/DeviceStateStore.js';
export { CollisionResolver } from './engine/CollisionResolver.js';
export { MetricsAggregator, averageAccessDelay, jainFairnessIndex } from './engine/MetricsAggregator.js';
export { SimulationEngine, runSimulation, type EngineOptions } from './engine/SimulationEngine.js';
export { runComparison, type ComparisonOptions } from './engine/ComparisonRunner.js';
export {
  SimulationConfigError,
  isAlgorithmName,
  validateEngineSetup,
  type EngineSetup,
  validateSimulationConfig,
} from './engine/validation.js';
export { createRng, deriveSeed, randomInt, type Rng } from './utils/rng.js';
export { formatTextReport } from './report/textReport.js';
export { buildChartPanels, type ChartBar, type ChartGrid, type ChartPanel } from './report/chartPanels.js';
