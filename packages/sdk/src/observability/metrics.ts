/**
 * Metrics tracking for index builds and searches
 */

export interface IndexMetrics {
  hitCount: number;
  missCount: number;
  searchTimeMs: number[];
  buildTimeMs: number[];
  length: number;
  alphabetSize: number;
}

const MAX_SAMPLES = 100;

function pushSample(samples: number[], ms: number): void {
  samples.push(ms);
  if (samples.length > MAX_SAMPLES) {
    samples.shift();
  }
}

class MetricsCollector {
  #metrics = new Map<string, IndexMetrics>();

  /**
   * Get or create metrics for a named index
   */
  #getMetrics(name: string): IndexMetrics {
    let metrics = this.#metrics.get(name);
    if (!metrics) {
      metrics = {
        hitCount: 0,
        missCount: 0,
        searchTimeMs: [],
        buildTimeMs: [],
        length: 0,
        alphabetSize: 0,
      };
      this.#metrics.set(name, metrics);
    }
    return metrics;
  }

  /**
   * Record a search that located at least one occurrence
   */
  recordHit(name: string): void {
    this.#getMetrics(name).hitCount++;
  }

  /**
   * Record a search that located nothing
   */
  recordMiss(name: string): void {
    this.#getMetrics(name).missCount++;
  }

  recordSearchTime(name: string, ms: number): void {
    pushSample(this.#getMetrics(name).searchTimeMs, ms);
  }

  recordBuildTime(name: string, ms: number): void {
    pushSample(this.#getMetrics(name).buildTimeMs, ms);
  }

  /**
   * Update size metrics after a build
   */
  updateSize(name: string, length: number, alphabetSize: number): void {
    const metrics = this.#getMetrics(name);
    metrics.length = length;
    metrics.alphabetSize = alphabetSize;
  }

  getMetrics(name: string): IndexMetrics | undefined {
    return this.#metrics.get(name);
  }

  getAllMetrics(): Map<string, IndexMetrics> {
    return new Map(this.#metrics);
  }

  /**
   * Fraction of searches that located at least one occurrence
   */
  getHitRate(name: string): number {
    const metrics = this.#getMetrics(name);
    const total = metrics.hitCount + metrics.missCount;
    return total > 0 ? metrics.hitCount / total : 0;
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  getP95SearchTime(name: string): number {
    return this.getP95(this.#getMetrics(name).searchTimeMs);
  }

  /**
   * Reset metrics for one index, or all of them
   */
  reset(name?: string): void {
    if (name) {
      this.#metrics.delete(name);
    } else {
      this.#metrics.clear();
    }
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
