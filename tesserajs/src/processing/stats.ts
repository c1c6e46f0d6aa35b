/** Summary of a numeric series, population variance */
export interface StatsSummary {
  count: number;
  mean: number;
  variance: number;
  std: number;
  min: number;
  max: number;
}

/**
 * Streaming mean and variance (Welford's update)
 *
 * Holds a constant amount of state whatever the number of observations.
 */
export class RunningStats {
  #count = 0;
  #mean = 0;
  // sum of squared distances to the current mean
  #m2 = 0;
  #min = Number.POSITIVE_INFINITY;
  #max = Number.NEGATIVE_INFINITY;

  push(value: number): void {
    this.#count++;
    const delta = value - this.#mean;
    this.#mean += delta / this.#count;
    this.#m2 += delta * (value - this.#mean);
    if (value < this.#min) this.#min = value;
    if (value > this.#max) this.#max = value;
  }

  get count(): number {
    return this.#count;
  }

  get mean(): number {
    return this.#mean;
  }

  get variance(): number {
    return this.#count === 0 ? 0 : this.#m2 / this.#count;
  }

  /** undefined until something was pushed */
  summary(): StatsSummary | undefined {
    if (this.#count === 0) return undefined;

    const variance = this.variance;
    return {
      count: this.#count,
      mean: this.#mean,
      variance,
      std: Math.sqrt(variance),
      min: this.#min,
      max: this.#max,
    };
  }
}
