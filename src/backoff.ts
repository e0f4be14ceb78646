export type ExponentialBackoffOptions = {
  baseMs: number;
  maxMs: number;
  factor?: number;
  /** Relative spread applied to each delay, e.g. 0.2 for ±20 %. */
  jitter?: number;
  random?: () => number;
};

export class ExponentialBackoff {
  private readonly baseMs: number;
  private readonly maxMs: number;
  private readonly factor: number;
  private readonly jitter: number;
  private readonly random: () => number;
  private attempt = 0;

  constructor(opts: ExponentialBackoffOptions) {
    if (!(opts.baseMs >= 0) || !(opts.maxMs >= opts.baseMs)) {
      throw new Error(`Invalid backoff bounds: base=${opts.baseMs} max=${opts.maxMs}`);
    }
    this.baseMs = opts.baseMs;
    this.maxMs = opts.maxMs;
    this.factor = opts.factor ?? 2;
    this.jitter = opts.jitter ?? 0.2;
    this.random = opts.random ?? Math.random;
  }

  get attempts(): number {
    return this.attempt;
  }

  next(): number {
    const raw = Math.min(this.maxMs, this.baseMs * this.factor ** this.attempt);
    this.attempt += 1;
    const spread = raw * this.jitter * (this.random() * 2 - 1);
    return Math.round(Math.min(this.maxMs, Math.max(0, raw + spread)));
  }

  reset(): void {
    this.attempt = 0;
  }
}
