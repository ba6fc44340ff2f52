import { BaseBackoffController } from './BaseBackoffController.js';

// Binary exponential backoff: the window doubles on every collision and snaps back to the minimum after a success.
export class BinaryExponentialBackoff extends BaseBackoffController {
  readonly algorithm = 'BEB' as const;

  protected windowAfterSuccess(): number {
    return this.minCW;
  }

  protected windowAfterCollision(contentionWindow: number): number {
    return Math.min(contentionWindow * 2, this.maxCW);
  }
}
