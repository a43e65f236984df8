export interface JobLatencySample {
  transcribeMs: number;
  correctMs: number;
  injectMs: number;
  totalMs: number;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  jobs: number;
  transcribeMs: PercentileSummary;
  correctMs: PercentileSummary;
  injectMs: PercentileSummary;
  totalMs: PercentileSummary;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

/** Rolling per-stage timings of completed jobs. */
export class LatencyTracker {
  private samples: JobLatencySample[] = [];

  public constructor(private readonly capacity = 200) {}

  public reset(): void {
    this.samples = [];
  }

  public push(sample: JobLatencySample): void {
    this.samples.push(sample);
    if (this.samples.length > this.capacity) {
      this.samples.shift();
    }
  }

  public summarize(): LatencySummary {
    return {
      jobs: this.samples.length,
      transcribeMs: asSummary(this.samples.map((sample) => sample.transcribeMs)),
      correctMs: asSummary(this.samples.map((sample) => sample.correctMs)),
      injectMs: asSummary(this.samples.map((sample) => sample.injectMs)),
      totalMs: asSummary(this.samples.map((sample) => sample.totalMs))
    };
  }
}
