import type { RunCounters, SlotOutcome } from '../types/simulation.js';

export class MetricsCollector {
  private successes = 0;

  private collisions = 0;

  private idleSlots = 0;

  record(outcome: SlotOutcome): void {
    if (outcome.idle) {
      this.idleSlots += 1;
      return;
    }
    this.successes += outcome.successfulDeviceIds.length;
    this.collisions += outcome.collidingGroups.length;
  }

  getCounters(): RunCounters {
    return {
      successes: this.successes,
      collisions: this.collisions,
      idleSlots: this.idleSlots,
    };
  }

  clear(): void {
    this.successes = 0;
    this.collisions = 0;
    this.idleSlots = 0;
  }
}
