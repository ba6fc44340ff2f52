import type { RunMetrics } from '../types/simulation.js';

export interface MetricDescriptor {
  key: keyof RunMetrics;
  label: string;
  title: string;
}

export const METRIC_DESCRIPTORS: readonly MetricDescriptor[] = [
  { key: 'throughput', label: 'Throughput', title: 'Throughput Comparison' },
  { key: 'fairnessIndex', label: 'Fairness', title: 'Fairness Comparison' },
  { key: 'avgAccessDelay', label: 'Average Access Delay', title: 'Access Delay Comparison' },
  { key: 'collisionProbability', label: 'Collision Probability', title: 'Collision Probability Comparison' },
];
