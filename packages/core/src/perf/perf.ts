/**
 * packages/core/src/perf/perf.ts — Loop phase timings.
 *
 * Why: Tells where a turn spends its time (event dispatch, render, draw,
 * effects) without a profiler attached. Enabled with WEFT_PERF=1; when off,
 * the module-level marks return immediately and nothing is allocated.
 */

export type InstrumentationPhase = "event_dispatch" | "render" | "draw" | "effects" | "turn";

export const PERF_PHASES: readonly InstrumentationPhase[] = Object.freeze([
  "event_dispatch",
  "render",
  "draw",
  "effects",
  "turn",
]);

export type PhaseStats = Readonly<{
  count: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  max: number;
  /** Up to ten highest retained samples, highest first. */
  worst10: readonly number[];
}>;

export type PerfSnapshot = Readonly<{
  phases: Readonly<Partial<Record<InstrumentationPhase, PhaseStats>>>;
}>;

/** Clock reading taken by markStart. */
export type PerfToken = number;

type PerfEnv = { process?: { env?: { WEFT_PERF?: string } } };

export const PERF_ENABLED: boolean = (globalThis as PerfEnv).process?.env?.WEFT_PERF === "1";

/** performance.now() where available, else Date.now(). */
export const monotonicNow: () => number =
  typeof globalThis.performance?.now === "function"
    ? () => globalThis.performance.now()
    : () => Date.now();

const DEFAULT_CAPACITY = 1024;

/** Fixed-capacity sample window; the oldest sample is overwritten first. */
class SampleRing {
  private readonly samples: Float64Array;
  private next = 0;
  private size = 0;
  private total = 0;

  constructor(capacity: number) {
    this.samples = new Float64Array(capacity);
  }

  push(value: number): void {
    if (this.size === this.samples.length) {
      this.total -= this.samples[this.next] ?? 0;
    } else {
      this.size++;
    }
    this.samples[this.next] = value;
    this.total += value;
    this.next = (this.next + 1) % this.samples.length;
  }

  stats(): PhaseStats | null {
    if (this.size === 0) return null;
    const sorted = Array.from(this.samples.subarray(0, this.size)).sort((a, b) => a - b);
    const at = (q: number): number =>
      sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? 0;
    return Object.freeze({
      count: this.size,
      avg: this.total / this.size,
      p50: at(0.5),
      p95: at(0.95),
      p99: at(0.99),
      max: sorted[sorted.length - 1] ?? 0,
      worst10: Object.freeze(sorted.slice(-10).reverse()),
    });
  }
}

/**
 * Per-phase sample windows. The module-level marks feed one shared instance;
 * tests construct their own with a fake clock.
 */
export class PerfAggregator {
  private readonly rings = new Map<InstrumentationPhase, SampleRing>();

  constructor(
    private readonly clock: () => number = monotonicNow,
    private readonly capacity = DEFAULT_CAPACITY,
  ) {}

  markStart(_phase: InstrumentationPhase): PerfToken {
    return this.clock();
  }

  markEnd(phase: InstrumentationPhase, token: PerfToken): void {
    this.record(phase, this.clock() - token);
  }

  record(phase: InstrumentationPhase, durationMs: number): void {
    let ring = this.rings.get(phase);
    if (ring === undefined) {
      ring = new SampleRing(this.capacity);
      this.rings.set(phase, ring);
    }
    ring.push(durationMs);
  }

  snapshot(): PerfSnapshot {
    const phases: Partial<Record<InstrumentationPhase, PhaseStats>> = {};
    for (const phase of PERF_PHASES) {
      const stats = this.rings.get(phase)?.stats();
      if (stats) phases[phase] = stats;
    }
    return Object.freeze({ phases: Object.freeze(phases) });
  }

  reset(): void {
    this.rings.clear();
  }
}

let shared: PerfAggregator | null = null;

function sharedAggregator(): PerfAggregator {
  shared ??= new PerfAggregator();
  return shared;
}

export function perfMarkStart(phase: InstrumentationPhase): PerfToken {
  return PERF_ENABLED ? sharedAggregator().markStart(phase) : 0;
}

export function perfMarkEnd(phase: InstrumentationPhase, token: PerfToken): void {
  if (PERF_ENABLED) sharedAggregator().markEnd(phase, token);
}

/** Empty unless WEFT_PERF=1. */
export function perfSnapshot(): PerfSnapshot {
  if (!PERF_ENABLED) return Object.freeze({ phases: Object.freeze({}) });
  return sharedAggregator().snapshot();
}

export function perfReset(): void {
  if (PERF_ENABLED) sharedAggregator().reset();
}
