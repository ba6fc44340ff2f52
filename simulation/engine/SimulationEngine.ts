import { createBackoffController } from '../backoff/createBackoffController.js';
import type { AlgorithmName, AlgorithmResult, ChannelConfig, RunMetrics, SlotOutcome } from '../types/simulation.js';
import { createRng } from '../utils/rng.js';
import { CollisionResolver } from './CollisionResolver.js';
import { DeviceStateStore } from './DeviceStateStore.js';
import { MetricsAggregator } from './MetricsAggregator.js';
import { MetricsCollector } from './MetricsCollector.js';
import { validateEngineSetup } from './validation.js';

export interface EngineOptions {
  seed: number;
  initialBackoffTimers?: readonly number[];
}

type SlotCallback = (outcome: SlotOutcome, store: DeviceStateStore) => void;

// Drives one algorithm over a fixed device population for exactly numSlots slots (1-based).
// All randomness comes from one seeded stream owned by the engine, so a run is reproducible from its seed.
export class SimulationEngine {
  readonly algorithm: AlgorithmName;

  private readonly channel: ChannelConfig;

  private readonly options: EngineOptions;

  private readonly store = new DeviceStateStore();

  private readonly collector = new MetricsCollector();

  private readonly aggregator = new MetricsAggregator();

  private readonly callbacks: SlotCallback[] = [];

  private resolver: CollisionResolver;

  private slot = 0;

  constructor(algorithm: AlgorithmName, channel: ChannelConfig, options: EngineOptions) {
    validateEngineSetup(channel, { algorithm, ...options });
    this.algorithm = algorithm;
    this.channel = channel;
    this.options = options;
    this.resolver = this.initializeRun();
  }

  reset(): void {
    this.resolver = this.initializeRun();
  }

  private initializeRun(): CollisionResolver {
    const rng = createRng(this.options.seed);
    const { numDevices, minCW, maxCW, numPreambles } = this.channel;

    this.store.reset({ numDevices, minCW, initialBackoffTimers: this.options.initialBackoffTimers }, rng);
    this.collector.clear();
    this.slot = 0;

    const controller = createBackoffController(this.algorithm, { minCW, maxCW }, rng);
    return new CollisionResolver(numPreambles, controller, rng);
  }

  onSlot(cb: SlotCallback): () => void {
    this.callbacks.push(cb);
    return () => {
      const index = this.callbacks.indexOf(cb);
      if (index !== -1) {
        this.callbacks.splice(index, 1);
      }
    };
  }

  isFinished(): boolean {
    return this.slot >= this.channel.numSlots;
  }

  getSlot(): number {
    return this.slot;
  }

  step(): SlotOutcome {
    if (this.isFinished()) {
      throw new Error(`Run already completed ${this.channel.numSlots} slots`);
    }

    this.slot += 1;
    const outcome = this.resolver.resolveSlot(this.slot, this.store);
    this.collector.record(outcome);

    for (const cb of this.callbacks) {
      cb(outcome, this.store);
    }
    return outcome;
  }

  run(): AlgorithmResult {
    this.reset();
    while (!this.isFinished()) {
      this.step();
    }

    const counters = this.collector.getCounters();
    const metrics = this.aggregator.computeMetrics({
      counters,
      numSlots: this.channel.numSlots,
      transmissionCounts: this.store.transmissionCounts(),
      cumulativeDelays: this.store.cumulativeDelays(),
    });

    return { algorithm: this.algorithm, metrics, counters };
  }
}

export function runSimulation(
  params: ChannelConfig & { algorithm: AlgorithmName; seed: number; initialBackoffTimers?: readonly number[] },
): RunMetrics {
  const { algorithm, seed, initialBackoffTimers, ...channel } = params;
  return new SimulationEngine(algorithm, channel, { seed, initialBackoffTimers }).run().metrics;
}
