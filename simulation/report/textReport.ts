import type { ComparisonResult } from '../types/simulation.js';
import { METRIC_DESCRIPTORS } from './metricLabels.js';

function formatValue(value: number): string {
  return Number.isNaN(value) ? 'NaN' : value.toFixed(4);
}

export function formatTextReport(comparison: ComparisonResult): string {
  const out: string[] = [];
  for (const descriptor of METRIC_DESCRIPTORS) {
    out.push(`${descriptor.label}:`);
    out.push(
      comparison.results
        .map((result) => `  ${result.algorithm}=${formatValue(result.metrics[descriptor.key])}`)
        .join(''),
    );
  }
  return `${out.join('\n')}\n`;
}
