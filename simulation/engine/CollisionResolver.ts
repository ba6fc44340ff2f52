import type { BaseBackoffController } from '../backoff/BaseBackoffController.js';
import type { Device, SlotOutcome } from '../types/simulation.js';
import { randomInt, type Rng } from '../utils/rng.js';
import type { DeviceStateStore } from './DeviceStateStore.js';

// Resolves one slot of the random-access channel.
// The ready set is captured once at slot start; every ready device draws its own preamble,
// a preamble with a single device is a success, any shared preamble is one collision.
// Groups are visited in ascending preamble order and devices by id, which fixes the order of random draws.
export class CollisionResolver {
  constructor(
    private readonly numPreambles: number,
    private readonly controller: BaseBackoffController,
    private readonly rng: Rng,
  ) {}

  resolveSlot(slot: number, store: DeviceStateStore): SlotOutcome {
    const ready = store.readyDevices();
    const outcome: SlotOutcome = {
      slot,
      readyCount: ready.length,
      successfulDeviceIds: [],
      collidingGroups: [],
      idle: ready.length === 0,
    };
    const retimed = new Set<number>();

    if (!outcome.idle) {
      const groups = this.assignPreambles(ready);
      const preambles = [...groups.keys()].sort((a, b) => a - b);

      for (const preamble of preambles) {
        const group = groups.get(preamble);
        if (!group) {
          continue;
        }

        if (group.length === 1) {
          const [device] = group;
          if (device) {
            this.succeed(device, slot);
            outcome.successfulDeviceIds.push(device.id);
            retimed.add(device.id);
          }
          continue;
        }

        for (const device of group) {
          this.controller.onCollision(device);
          retimed.add(device.id);
        }
        outcome.collidingGroups.push(group.map((device) => device.id));
      }
    }

    store.countDown(retimed);
    return outcome;
  }

  private assignPreambles(ready: readonly Device[]): Map<number, Device[]> {
    const groups = new Map<number, Device[]>();
    for (const device of ready) {
      const preamble = randomInt(this.rng, 1, this.numPreambles);
      const group = groups.get(preamble);
      if (group) {
        group.push(device);
      } else {
        groups.set(preamble, [device]);
      }
    }
    return groups;
  }

  private succeed(device: Device, slot: number): void {
    device.cumulativeDelay += slot;
    device.transmissionCount += 1;
    device.hasSucceeded = true;
    this.controller.onSuccess(device);
  }
}
