import type { StoredRun } from '../types.js';
import { toPrometheusText } from './prometheus.js';

export class PrometheusSnapshotStore {
  private latestRun: StoredRun | null = null;

  setLatest(run: StoredRun): void {
    this.latestRun = run;
  }

  getText(): string {
    if (!this.latestRun) {
      return '# No runs completed yet\n';
    }
    return toPrometheusText(this.latestRun);
  }
}
