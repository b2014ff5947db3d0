/** Running count / sum / min / max of one series. */
class Series {
  count = 0;
  sum = 0;
  min = Infinity;
  max = -Infinity;

  add(v: number) {
    this.count++;
    this.sum += v;
    if (v < this.min) this.min = v;
    if (v > this.max) this.max = v;
  }

  get avg() { return this.count > 0 ? this.sum / this.count : 0; }
}

export type MetricsSnapshot = {
  requests: { total: number; errors: number; success_rate: number };
  performance: { avg_duration_ms: number; min_duration_ms: number; max_duration_ms: number };
  algorithm: { avg_iterations: number; avg_matrix_size: number; avg_solve_duration_ms: number };
  batch: { avg_batch_size: number; total_batches: number };
};

/** In-memory service counters; one instance per app. */
export class MetricsCollector {
  private errors = 0;
  private durations = new Series();
  private iterations = new Series();
  private sizes = new Series();
  private solveDurations = new Series();
  private batches = new Series();

  recordRequest(durationMs: number, status: number) {
    this.durations.add(durationMs);
    if (status >= 400) this.errors++;
  }

  /** `durationMs` is left out where the solve was not timed on its own (batch items). */
  recordSolve(iterations: number, matrixSize: number, durationMs?: number) {
    this.iterations.add(iterations);
    this.sizes.add(matrixSize);
    if (durationMs !== undefined) this.solveDurations.add(durationMs);
  }

  recordBatch(size: number) {
    this.batches.add(size);
  }

  snapshot(): MetricsSnapshot {
    const total = this.durations.count;
    return {
      requests: {
        total,
        errors: this.errors,
        success_rate: total > 0 ? ((total - this.errors) / total) * 100 : 0,
      },
      performance: {
        avg_duration_ms: this.durations.avg,
        min_duration_ms: total > 0 ? this.durations.min : 0,
        max_duration_ms: total > 0 ? this.durations.max : 0,
      },
      algorithm: {
        avg_iterations: this.iterations.avg,
        avg_matrix_size: this.sizes.avg,
        avg_solve_duration_ms: this.solveDurations.avg,
      },
      batch: {
        avg_batch_size: this.batches.avg,
        total_batches: this.batches.count,
      },
    };
  }

  reset() {
    this.errors = 0;
    this.durations = new Series();
    this.iterations = new Series();
    this.sizes = new Series();
    this.solveDurations = new Series();
    this.batches = new Series();
  }
}
