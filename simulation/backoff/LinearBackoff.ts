import { BaseBackoffController } from './BaseBackoffController.js';

// Linear increase, linear decrease (LILD): one slot wider per collision, one narrower per success.
export class LinearBackoff extends BaseBackoffController {
  readonly algorithm = 'LILD' as const;

  protected windowAfterSuccess(contentionWindow: number): number {
    return Math.max(this.minCW, contentionWindow - 1);
  }

  protected windowAfterCollision(contentionWindow: number): number {
    return Math.min(contentionWindow + 1, this.maxCW);
  }
}
