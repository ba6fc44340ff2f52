import type { RunSummary, StoredRun } from '../types.js';

export class RunStateStore {
  private readonly runs = new Map<string, StoredRun>();

  constructor(private readonly historyLimit = 50) {}

  save(run: StoredRun): void {
    this.runs.delete(run.runId);
    this.runs.set(run.runId, run);

    // Map iteration is insertion order, so the first key is the oldest run.
    while (this.runs.size > this.historyLimit) {
      const oldest = this.runs.keys().next().value;
      if (oldest === undefined) break;
      this.runs.delete(oldest);
    }
  }

  get(runId: string): StoredRun | undefined {
    return this.runs.get(runId);
  }

  list(): RunSummary[] {
    return [...this.runs.values()]
      .reverse()
      .map((run) => ({
        runId: run.runId,
        createdAt: new Date(run.createdAt).toISOString(),
        algorithms: run.comparison.results.map((result) => result.algorithm)
      }));
  }

  get size(): number {
    return this.runs.size;
  }
}
