/**
 * Reproducible choices for the scripted agent (mulberry32 underneath).
 */

export interface WeightedOption<T> {
  value: T;
  /** Relative weight; 0 excludes the option */
  weight: number;
}

export class SeededChooser {
  private state: number;

  constructor(seed: number = 1) {
    this.state = seed | 0;
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  /** Number of repeated steps in [1, max] */
  steps(max: number): number {
    return 1 + Math.floor(this.next() * Math.max(1, Math.floor(max)));
  }

  weighted<T>(options: readonly WeightedOption<T>[]): T {
    const total = options.reduce((sum, o) => sum + Math.max(0, o.weight), 0);
    if (total <= 0) throw new RangeError('No option has a positive weight');

    let roll = this.next() * total;
    for (const option of options) {
      if (option.weight <= 0) continue;
      roll -= option.weight;
      if (roll < 0) return option.value;
    }
    // Rounding can leave a sliver; the last eligible option takes it
    const last = [...options].reverse().find((o) => o.weight > 0);
    if (!last) throw new RangeError('No option has a positive weight');
    return last.value;
  }

  private next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}
