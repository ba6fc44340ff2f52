import type { StoredRun } from '../types.js';

export type PrometheusMode = 'pushgateway' | 'scrape' | 'both';

export interface PrometheusConfig {
  enabled: boolean;
  mode: PrometheusMode;
  pushgatewayUrl?: string;
  jobName: string;
}

function esc(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

// NaN is a valid sample value in the exposition format and marks "no measurement".
function formatSample(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Number.POSITIVE_INFINITY) return '+Inf';
  if (value === Number.NEGATIVE_INFINITY) return '-Inf';
  return String(value);
}

function line(name: string, labels: Record<string, string>, value: number): string {
  const labelText = Object.entries(labels)
    .map(([k, v]) => `${k}="${esc(v)}"`)
    .join(',');
  return `${name}{${labelText}} ${formatSample(value)}`;
}

function metricMeta(name: string, type: 'gauge' | 'counter', help: string): string[] {
  return [`# HELP ${name} ${help}`, `# TYPE ${name} ${type}`];
}

export function toPrometheusText(run: StoredRun): string {
  const out: string[] = [];
  const { config, results } = run.comparison;

  out.push(...metricMeta('backoff_throughput_ratio', 'gauge', 'Successful transmissions per slot.'));
  out.push(...metricMeta('backoff_fairness_index', 'gauge', "Jain's fairness index over successful transmissions."));
  out.push(...metricMeta('backoff_avg_access_delay_slots', 'gauge', 'Mean access delay in slots; NaN when no device succeeded.'));
  out.push(...metricMeta('backoff_collision_probability_ratio', 'gauge', 'Colliding preamble groups per slot.'));
  out.push(...metricMeta('backoff_successes_total', 'counter', 'Successful transmissions in the run.'));
  out.push(...metricMeta('backoff_collisions_total', 'counter', 'Colliding preamble groups in the run.'));
  out.push(...metricMeta('backoff_run_devices', 'gauge', 'Device population of the run.'));
  out.push(...metricMeta('backoff_run_slots', 'gauge', 'Number of simulated slots.'));

  for (const result of results) {
    const common = { run_id: run.runId, algorithm: result.algorithm };
    out.push(line('backoff_throughput_ratio', common, result.metrics.throughput));
    out.push(line('backoff_fairness_index', common, result.metrics.fairnessIndex));
    out.push(line('backoff_avg_access_delay_slots', common, result.metrics.avgAccessDelay));
    out.push(line('backoff_collision_probability_ratio', common, result.metrics.collisionProbability));
    out.push(line('backoff_successes_total', common, result.counters.successes));
    out.push(line('backoff_collisions_total', common, result.counters.collisions));
  }

  out.push(line('backoff_run_devices', { run_id: run.runId }, config.numDevices));
  out.push(line('backoff_run_slots', { run_id: run.runId }, config.numSlots));
  return `${out.join('\n')}\n`;
}

export function shouldPushToGateway(config: PrometheusConfig): boolean {
  return config.enabled && (config.mode === 'pushgateway' || config.mode === 'both');
}

export function shouldExposeScrape(config: PrometheusConfig): boolean {
  return config.enabled && (config.mode === 'scrape' || config.mode === 'both');
}

export async function pushRunToPushgateway(
  run: StoredRun,
  pushgatewayUrl: string,
  jobName = 'backoff_simulation'
): Promise<void> {
  const res = await fetch(`${pushgatewayUrl}/metrics/job/${encodeURIComponent(jobName)}`, {
    method: 'POST',
    headers: { 'Content-Type': 'text/plain; version=0.0.4' },
    body: toPrometheusText(run)
  });
  if (!res.ok) throw new Error(`Pushgateway push failed (${res.status})`);
}

export async function checkPushgateway(pushgatewayUrl: string): Promise<'connected' | 'error'> {
  try {
    const res = await fetch(`${pushgatewayUrl}/-/healthy`);
    if (res.ok) return 'connected';

    // Some Pushgateway deployments don't expose /-/healthy.
    const fallback = await fetch(pushgatewayUrl);
    return fallback.ok ? 'connected' : 'error';
  } catch {
    return 'error';
  }
}
