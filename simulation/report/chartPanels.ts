import type { ComparisonResult } from '../types/simulation.js';
import { METRIC_DESCRIPTORS } from './metricLabels.js';

export interface ChartBar {
  label: string;
  // NaN stays NaN so the renderer can mark a missing measurement.
  value: number;
}

export interface ChartPanel {
  title: string;
  yLabel: string;
  row: number;
  column: number;
  bars: ChartBar[];
}

export interface ChartGrid {
  title: string;
  rows: number;
  columns: number;
  panels: ChartPanel[];
}

// Describes the 2x2 bar-chart grid (one panel per metric, one bar per algorithm) for an external renderer.
export function buildChartPanels(comparison: ComparisonResult): ChartGrid {
  return {
    title: 'Performance Metrics Comparison',
    rows: 2,
    columns: 2,
    panels: METRIC_DESCRIPTORS.map((descriptor, index) => ({
      title: descriptor.title,
      yLabel: descriptor.label,
      row: Math.floor(index / 2),
      column: index % 2,
      bars: comparison.results.map((result) => ({
        label: result.algorithm,
        value: result.metrics[descriptor.key],
      })),
    })),
  };
}
