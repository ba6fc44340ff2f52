import type { Device, DeviceState } from '../types/simulation.js';
import { randomInt, type Rng } from '../utils/rng.js';

export interface DevicePopulation {
  numDevices: number;
  minCW: number;
  initialBackoffTimers?: readonly number[];
}

export class DeviceStateStore {
  private devices: Device[] = [];

  reset(population: DevicePopulation, rng: Rng): void {
    const { numDevices, minCW, initialBackoffTimers } = population;
    this.devices = [];
    for (let id = 0; id < numDevices; id += 1) {
      this.devices.push({
        id,
        contentionWindow: minCW,
        backoffTimer: initialBackoffTimers?.[id] ?? randomInt(rng, 0, minCW - 1),
        transmissionCount: 0,
        cumulativeDelay: 0,
        hasSucceeded: false,
      });
    }
  }

  get size(): number {
    return this.devices.length;
  }

  all(): readonly Device[] {
    return this.devices;
  }

  get(id: number): Device | undefined {
    return this.devices[id];
  }

  stateOf(device: Device): DeviceState {
    if (device.hasSucceeded) {
      return 'done';
    }
    return device.backoffTimer === 0 ? 'ready' : 'waiting';
  }

  readyDevices(): Device[] {
    return this.devices.filter((device) => this.stateOf(device) === 'ready');
  }

  // Counts down every contending device except those re-timed during the current slot.
  countDown(retimed: ReadonlySet<number>): void {
    for (const device of this.devices) {
      if (device.hasSucceeded || retimed.has(device.id) || device.backoffTimer === 0) {
        continue;
      }
      device.backoffTimer -= 1;
    }
  }

  transmissionCounts(): number[] {
    return this.devices.map((device) => device.transmissionCount);
  }

  cumulativeDelays(): number[] {
    return this.devices.map((device) => device.cumulativeDelay);
  }
}
