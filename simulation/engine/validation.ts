import { ALGORITHMS, type AlgorithmName, type ChannelConfig, type SimulationConfig } from '../types/simulation.js';

export class SimulationConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid simulation config: ${issues.join('; ')}`);
    this.name = 'SimulationConfigError';
    this.issues = issues;
  }
}

export function isAlgorithmName(value: unknown): value is AlgorithmName {
  return typeof value === 'string' && ALGORITHMS.includes(value as AlgorithmName);
}

function checkInteger(issues: string[], name: string, value: number, min: number): void {
  if (!Number.isInteger(value)) {
    issues.push(`${name} must be an integer`);
  } else if (value < min) {
    issues.push(`${name} must be >= ${min}`);
  }
}

function channelIssues(config: ChannelConfig): string[] {
  const issues: string[] = [];
  checkInteger(issues, 'numDevices', config.numDevices, 1);
  checkInteger(issues, 'numSlots', config.numSlots, 1);
  checkInteger(issues, 'minCW', config.minCW, 1);
  checkInteger(issues, 'numPreambles', config.numPreambles, 1);
  if (!Number.isInteger(config.maxCW)) {
    issues.push('maxCW must be an integer');
  } else if (config.maxCW < config.minCW) {
    issues.push('maxCW must be >= minCW');
  }
  return issues;
}

function initialTimerIssues(config: ChannelConfig, timers: readonly number[]): string[] {
  if (timers.length !== config.numDevices) {
    return [`initialBackoffTimers must have one entry per device (${config.numDevices})`];
  }
  const outOfRange = timers.findIndex((t) => !Number.isInteger(t) || t < 0 || t > config.minCW - 1);
  return outOfRange === -1
    ? []
    : [`initialBackoffTimers[${outOfRange}] must be an integer in [0, ${config.minCW - 1}]`];
}

const MAX_SEED = 0xffffffff;

// Seeds feed a 32-bit generator; anything wider would alias another seed.
function seedIssues(seed: number): string[] {
  return Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED
    ? []
    : [`seed must be a 32-bit integer in [0, ${MAX_SEED}]`];
}

export interface EngineSetup {
  algorithm: unknown;
  seed: number;
  initialBackoffTimers?: readonly number[];
}

export function validateEngineSetup(config: ChannelConfig, setup: EngineSetup): void {
  const issues = channelIssues(config);
  if (!isAlgorithmName(setup.algorithm)) {
    issues.push(`unknown algorithm: ${String(setup.algorithm)} (expected ${ALGORITHMS.join(', ')})`);
  }
  issues.push(...seedIssues(setup.seed));
  if (issues.length === 0 && setup.initialBackoffTimers) {
    issues.push(...initialTimerIssues(config, setup.initialBackoffTimers));
  }
  if (issues.length > 0) {
    throw new SimulationConfigError(issues);
  }
}

export function validateSimulationConfig(config: SimulationConfig): void {
  const issues = channelIssues(config);

  if (config.algorithms.length === 0) {
    issues.push('algorithms must not be empty');
  }
  const unknown = config.algorithms.filter((name) => !isAlgorithmName(name));
  if (unknown.length > 0) {
    issues.push(`unknown algorithms: ${unknown.join(', ')} (expected ${ALGORITHMS.join(', ')})`);
  }
  if (new Set(config.algorithms).size !== config.algorithms.length) {
    issues.push('algorithms must not repeat');
  }
  issues.push(...seedIssues(config.seed));

  if (issues.length > 0) {
    throw new SimulationConfigError(issues);
  }
}
