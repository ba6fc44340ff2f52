import type { AlgorithmName, Device } from '../types/simulation.js';
import { randomInt, type Rng } from '../utils/rng.js';

export interface WindowBounds {
  minCW: number;
  maxCW: number;
}

// Base contract shared by every contention-window policy.
// It owns clamping to [minCW, maxCW] and the timer redraw after each update.
// Concrete policies only decide the next window on success and on collision.
export abstract class BaseBackoffController {
  abstract readonly algorithm: AlgorithmName;

  protected readonly minCW: number;

  protected readonly maxCW: number;

  private readonly rng: Rng;

  constructor(bounds: WindowBounds, rng: Rng) {
    this.minCW = bounds.minCW;
    this.maxCW = bounds.maxCW;
    this.rng = rng;
  }

  protected abstract windowAfterSuccess(contentionWindow: number): number;

  protected abstract windowAfterCollision(contentionWindow: number): number;

  onSuccess(device: Device): void {
    this.apply(device, this.windowAfterSuccess(device.contentionWindow));
  }

  onCollision(device: Device): void {
    this.apply(device, this.windowAfterCollision(device.contentionWindow));
  }

  private apply(device: Device, nextWindow: number): void {
    device.contentionWindow = Math.min(this.maxCW, Math.max(this.minCW, nextWindow));
    device.backoffTimer = randomInt(this.rng, 0, device.contentionWindow - 1);
  }
}
