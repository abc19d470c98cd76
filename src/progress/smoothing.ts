/**
 * Smoothing algorithms for noisy rate measurements
 *
 * Both variants ignore the elapsed time; it is part of the signature so
 * time-aware algorithms can be dropped in.
 */

import { DEFAULTS } from "../core/constants.js";

export interface SmoothingAlgorithm {
  /** Feed one observation and get the smoothed value back */
  update(newValue: number, elapsedSeconds: number): number;
}

/**
 * value = alpha * new + (1 - alpha) * value, starting at 0
 */
export class ExponentialMovingAverage implements SmoothingAlgorithm {
  readonly alpha: number;
  private value = 0;

  constructor(alpha: number = DEFAULTS.smoothingAlpha) {
    this.alpha = alpha;
  }

  update(newValue: number, _elapsedSeconds: number): number {
    this.value = this.alpha * newValue + (1 - this.alpha) * this.value;
    return this.value;
  }
}

/**
 * An EMA of an EMA with the lag correction `2 * ema1 - ema2`
 */
export class DoubleExponentialMovingAverage implements SmoothingAlgorithm {
  readonly alpha: number;
  private ema1 = 0;
  private ema2 = 0;

  constructor(alpha: number = DEFAULTS.smoothingAlpha) {
    this.alpha = alpha;
  }

  update(newValue: number, _elapsedSeconds: number): number {
    this.ema1 = this.alpha * newValue + (1 - this.alpha) * this.ema1;
    this.ema2 = this.alpha * this.ema1 + (1 - this.alpha) * this.ema2;
    return 2 * this.ema1 - this.ema2;
  }
}
