import type {
  AlgorithmName,
  AlgorithmResult,
  ComparisonResult,
  RunMetrics,
  SimulationConfig
} from '../simulation/types/simulation.js';
import { isAlgorithmName } from '../simulation/engine/validation.js';

export type { AlgorithmName, AlgorithmResult, ComparisonResult, RunMetrics, SimulationConfig };

export interface StoredRun {
  runId: string;
  createdAt: number;
  comparison: ComparisonResult;
}

export interface RunSummary {
  runId: string;
  createdAt: string;
  algorithms: AlgorithmName[];
}

export interface MetricsPayload {
  throughput: number;
  fairnessIndex: number;
  avgAccessDelay: number | null;
  collisionProbability: number;
}

export interface RunPayload {
  runId: string;
  createdAt: string;
  config: SimulationConfig;
  results: Array<{ algorithm: AlgorithmName; metrics: MetricsPayload; successes: number; collisions: number }>;
}

export class HttpError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

const NUMERIC_FIELDS = ['numDevices', 'numSlots', 'minCW', 'maxCW', 'numPreambles', 'seed'] as const;

// Device-slot updates a run performs: every algorithm walks every device in every slot.
export function runWork(config: SimulationConfig): number {
  return Math.abs(config.numDevices * config.numSlots) * config.algorithms.length;
}

// Overlays a request body on the configured defaults. Shape problems and requests above the
// per-run work ceiling are 400s here; rule violations (e.g. maxCW < minCW) are left to
// validateSimulationConfig.
export function parseRunRequest(body: unknown, defaults: SimulationConfig, maxWork: number): SimulationConfig {
  const config = overlayRunRequest(body, defaults);
  const work = runWork(config);
  if (work > maxWork) {
    throw new HttpError(400, `Requested work ${work} (numDevices x numSlots x algorithms) exceeds the limit of ${maxWork}`);
  }
  return config;
}

function overlayRunRequest(body: unknown, defaults: SimulationConfig): SimulationConfig {
  if (body === undefined || body === null) return { ...defaults, algorithms: [...defaults.algorithms] };
  if (typeof body !== 'object' || Array.isArray(body)) throw new HttpError(400, 'Expected a JSON object body');
  const v = body as Record<string, unknown>;
  const config: SimulationConfig = { ...defaults, algorithms: [...defaults.algorithms] };

  for (const field of NUMERIC_FIELDS) {
    const value = v[field];
    if (value === undefined) continue;
    if (typeof value !== 'number') throw new HttpError(400, `Expected ${field} to be a number`);
    config[field] = value;
  }

  if (v.algorithms !== undefined) {
    if (!Array.isArray(v.algorithms) || !v.algorithms.every((name) => typeof name === 'string')) {
      throw new HttpError(400, 'Expected algorithms to be an array of names');
    }
    const unknown = v.algorithms.filter((name) => !isAlgorithmName(name));
    if (unknown.length > 0) throw new HttpError(400, `Unknown algorithms: ${unknown.join(', ')}`);
    config.algorithms = v.algorithms.filter(isAlgorithmName);
  }

  return config;
}

function toMetricsPayload(metrics: RunMetrics): MetricsPayload {
  return {
    throughput: metrics.throughput,
    fairnessIndex: metrics.fairnessIndex,
    avgAccessDelay: Number.isNaN(metrics.avgAccessDelay) ? null : metrics.avgAccessDelay,
    collisionProbability: metrics.collisionProbability
  };
}

export function toRunPayload(run: StoredRun): RunPayload {
  return {
    runId: run.runId,
    createdAt: new Date(run.createdAt).toISOString(),
    config: run.comparison.config,
    results: run.comparison.results.map((result) => ({
      algorithm: result.algorithm,
      metrics: toMetricsPayload(result.metrics),
      successes: result.counters.successes,
      collisions: result.counters.collisions
    }))
  };
}
