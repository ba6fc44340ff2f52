import dotenv from 'dotenv';
import { ALGORITHMS, type AlgorithmName, type SimulationConfig } from '../simulation/types/simulation.js';
import { isAlgorithmName } from '../simulation/engine/validation.js';
import type { PrometheusConfig, PrometheusMode } from './services/prometheus.js';

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  runHistoryLimit: number;
  maxWorkPerRun: number;
  simulation: SimulationConfig;
  prometheus: PrometheusConfig;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^-?\d+$/.test(raw)) throw new Error(`Invalid ${name}: expected an integer, got "${raw}"`);
  return Number(raw);
}

export function parseAlgorithms(value: string | undefined): AlgorithmName[] {
  const names = value
    ?.split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (!names || names.length === 0) return [...ALGORITHMS];

  const unknown = names.filter((name) => !isAlgorithmName(name));
  if (unknown.length > 0) {
    throw new Error(`Invalid SIM_ALGORITHMS: unknown ${unknown.join(', ')} (expected ${ALGORITHMS.join(', ')})`);
  }
  return names.filter(isAlgorithmName);
}

export function parsePrometheusMode(value: string | undefined): PrometheusMode {
  const normalized = value?.trim().toLowerCase();
  if (!normalized || normalized === 'pushgateway') return 'pushgateway';
  if (normalized === 'scrape') return 'scrape';
  if (normalized === 'both') return 'both';
  throw new Error('Invalid PROMETHEUS_MODE. Expected pushgateway, scrape, or both');
}

function resolvePrometheusConfig(env: Env): PrometheusConfig {
  const pushgatewayUrl = env.PUSHGATEWAY_URL?.trim();
  return {
    enabled: env.PROMETHEUS_ENABLED?.trim().toLowerCase() === 'true',
    mode: parsePrometheusMode(env.PROMETHEUS_MODE),
    jobName: env.PROMETHEUS_JOB_NAME?.trim() || 'backoff_simulation',
    ...(pushgatewayUrl ? { pushgatewayUrl } : {})
  };
}

export function resolveSimulationDefaults(env: Env): SimulationConfig {
  return {
    numDevices: readInt(env, 'SIM_NUM_DEVICES', 300),
    numSlots: readInt(env, 'SIM_NUM_SLOTS', 1000),
    minCW: readInt(env, 'SIM_MIN_CW', 24),
    maxCW: readInt(env, 'SIM_MAX_CW', 1024),
    numPreambles: readInt(env, 'SIM_NUM_PREAMBLES', 10),
    algorithms: parseAlgorithms(env.SIM_ALGORITHMS),
    seed: readInt(env, 'SIM_SEED', 1)
  };
}

export function resolveServerConfig(env: Env): ServerConfig {
  const runHistoryLimit = readInt(env, 'RUN_HISTORY_LIMIT', 50);
  if (runHistoryLimit < 1) throw new Error('Invalid RUN_HISTORY_LIMIT: expected a positive integer');

  const maxWorkPerRun = readInt(env, 'SIM_MAX_WORK', 20_000_000);
  if (maxWorkPerRun < 1) throw new Error('Invalid SIM_MAX_WORK: expected a positive integer');

  return {
    port: readInt(env, 'PORT', 3001),
    corsOrigin: env.CORS_ORIGIN?.trim() || 'http://localhost:5173',
    runHistoryLimit,
    maxWorkPerRun,
    simulation: resolveSimulationDefaults(env),
    prometheus: resolvePrometheusConfig(env)
  };
}

export function loadServerConfig(): ServerConfig {
  dotenv.config();
  return resolveServerConfig(process.env);
}
