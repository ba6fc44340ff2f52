import { BaseBackoffController } from './BaseBackoffController.js';

const DECREASE_FACTOR = 0.1;
const INCREASE_FACTOR = 0.7;

// Adaptive model: proportional steps instead of fixed ones.
// A success shrinks the window by 10% of its size, a collision grows it by 70%.
// The adjustment term is rounded half-up; windows below 5 never shrink on success.
export class AdaptiveBackoff extends BaseBackoffController {
  readonly algorithm = 'Adaptive' as const;

  protected windowAfterSuccess(contentionWindow: number): number {
    return Math.max(this.minCW, contentionWindow - Math.round(contentionWindow * DECREASE_FACTOR));
  }

  protected windowAfterCollision(contentionWindow: number): number {
    return Math.min(contentionWindow + Math.round(contentionWindow * INCREASE_FACTOR), this.maxCW);
  }
}
