export type AlgorithmName = 'BEB' | 'LILD' | 'Adaptive';

export const ALGORITHMS: readonly AlgorithmName[] = ['BEB', 'LILD', 'Adaptive'];

export interface ChannelConfig {
  numDevices: number;
  numSlots: number;
  minCW: number;
  maxCW: number;
  numPreambles: number;
}

export interface SimulationConfig extends ChannelConfig {
  algorithms: AlgorithmName[];
  seed: number;
}

export interface Device {
  readonly id: number;
  contentionWindow: number;
  backoffTimer: number;
  // Successful transmissions only; collided attempts are not counted.
  transmissionCount: number;
  cumulativeDelay: number;
  hasSucceeded: boolean;
}

export type DeviceState = 'waiting' | 'ready' | 'done';

export interface SlotOutcome {
  slot: number;
  readyCount: number;
  successfulDeviceIds: number[];
  collidingGroups: number[][];
  idle: boolean;
}

export interface RunCounters {
  successes: number;
  collisions: number;
  idleSlots: number;
}

export interface RunMetrics {
  throughput: number;
  fairnessIndex: number;
  // NaN when no device ever succeeded.
  avgAccessDelay: number;
  collisionProbability: number;
}

export interface AlgorithmResult {
  algorithm: AlgorithmName;
  metrics: RunMetrics;
  counters: RunCounters;
}

export interface ComparisonResult {
  config: SimulationConfig;
  results: AlgorithmResult[];
}
