/**
 * In-process metrics: counters, gauges and a bucketed histogram collected
 * in a {@link MetricsRegistry}. No exporter is attached; a host process
 * reads {@link MetricsRegistry.snapshot} and ships it wherever it likes.
 */

// ─── Snapshots ──────────────────────────────────────────────────────────────────

/** Point-in-time view of a histogram. */
export interface HistogramSnapshot {
  count: number;
  sum: number;
  /** Infinity when nothing was observed. */
  min: number;
  /** -Infinity when nothing was observed. */
  max: number;
  /** Cumulative count per upper bound, keyed `le_<bound>`. */
  buckets: Record<string, number>;
}

/** Point-in-time view of every metric in a registry. */
export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  histograms: Record<string, HistogramSnapshot>;
}

// ─── Counter ────────────────────────────────────────────────────────────────────

/** A monotonically increasing counter. */
export class Counter {
  readonly name: string;
  readonly description: string;
  private value = 0;

  constructor(name: string, description?: string) {
    this.name = name;
    this.description = description ?? '';
  }

  /**
   * Add `amount` (default 1).
   *
   * @throws {RangeError} When `amount` is negative.
   */
  increment(amount = 1): void {
    if (amount < 0) {
      throw new RangeError(`counter ${this.name} cannot decrease`);
    }
    this.value += amount;
  }

  get(): number {
    return this.value;
  }
}

// ─── Gauge ──────────────────────────────────────────────────────────────────────

/** A value that can go up and down, e.g. mailbox depth. */
export class Gauge {
  readonly name: string;
  readonly description: string;
  private value = 0;

  constructor(name: string, description?: string) {
    this.name = name;
    this.description = description ?? '';
  }

  set(value: number): void {
    this.value = value;
  }

  increment(amount = 1): void {
    this.value += amount;
  }

  decrement(amount = 1): void {
    this.value -= amount;
  }

  get(): number {
    return this.value;
  }
}

// ─── Histogram ──────────────────────────────────────────────────────────────────

const DEFAULT_BUCKETS: readonly number[] = [0, 1, 4, 16, 64, 256, 1024];

/**
 * Bucketed histogram. Only per-bucket counts are retained, so memory is
 * constant in the number of observations.
 */
export class Histogram {
  readonly name: string;
  readonly bounds: readonly number[];
  private readonly counts: number[];
  private count = 0;
  private sum = 0;
  private min = Infinity;
  private max = -Infinity;

  constructor(name: string, bounds?: readonly number[]) {
    this.name = name;
    this.bounds = bounds ? [...bounds].sort((a, b) => a - b) : DEFAULT_BUCKETS;
    this.counts = this.bounds.map(() => 0);
  }

  observe(value: number): void {
    this.count++;
    this.sum += value;
    if (value < this.min) this.min = value;
    if (value > this.max) this.max = value;
    this.bounds.forEach((bound, i) => {
      if (value <= bound) {
        this.counts[i] = (this.counts[i] ?? 0) + 1;
      }
    });
  }

  get(): HistogramSnapshot {
    const buckets: Record<string, number> = {};
    this.bounds.forEach((bound, i) => {
      buckets[`le_${bound}`] = this.counts[i] ?? 0;
    });
    return { count: this.count, sum: this.sum, min: this.min, max: this.max, buckets };
  }
}

// ─── Registry ───────────────────────────────────────────────────────────────────

/**
 * Named collection of metrics. Asking for an existing name returns the
 * instance already registered under it.
 */
export class MetricsRegistry {
  private readonly counters = new Map<string, Counter>();
  private readonly gauges = new Map<string, Gauge>();
  private readonly histograms = new Map<string, Histogram>();

  counter(name: string, description?: string): Counter {
    let c = this.counters.get(name);
    if (!c) {
      c = new Counter(name, description);
      this.counters.set(name, c);
    }
    return c;
  }

  gauge(name: string, description?: string): Gauge {
    let g = this.gauges.get(name);
    if (!g) {
      g = new Gauge(name, description);
      this.gauges.set(name, g);
    }
    return g;
  }

  histogram(name: string, bounds?: readonly number[]): Histogram {
    let h = this.histograms.get(name);
    if (!h) {
      h = new Histogram(name, bounds);
      this.histograms.set(name, h);
    }
    return h;
  }

  snapshot(): MetricsSnapshot {
    const counters: Record<string, number> = {};
    for (const [name, c] of this.counters) counters[name] = c.get();
    const gauges: Record<string, number> = {};
    for (const [name, g] of this.gauges) gauges[name] = g.get();
    const histograms: Record<string, HistogramSnapshot> = {};
    for (const [name, h] of this.histograms) histograms[name] = h.get();
    return { counters, gauges, histograms };
  }
}

export function createMetricsRegistry(): MetricsRegistry {
  return new MetricsRegistry();
}
