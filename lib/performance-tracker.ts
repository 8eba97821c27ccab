/* ============================================================================
   performance-tracker.ts
   Comparative latency counters for the two transports.

   One record() per completed dispatch, attributed to the transport that
   finished it. Direct skips and absorbed direct failures are counted on their
   own so the share figures stay about completed calls only.
============================================================================ */

import type { DirectFailureKind } from "./errors.js";
import type { TransportName } from "./transport.js";

export interface TransportStats {
  calls: number;
  successes: number;
  failures: number;
  totalSeconds: number;
  /** totalSeconds ÷ calls, 0 when there are none. */
  averageSeconds: number;
}

export interface PerformanceSnapshot {
  direct: TransportStats;
  fallback: TransportStats;
  totalCalls: number;
  /** Percentages of totalCalls; null before the first call. */
  directShare: number | null;
  fallbackShare: number | null;
  directSkips: number;
  directFailures: Partial<Record<DirectFailureKind, number>>;
  /** Average fallback time ÷ average direct time; null until both have a call. */
  speedImprovement: number | null;
}

interface Counters {
  calls: number;
  successes: number;
  failures: number;
  totalSeconds: number;
}

const emptyCounters = (): Counters => ({ calls: 0, successes: 0, failures: 0, totalSeconds: 0 });

export class PerformanceTracker {
  private counters: Record<TransportName, Counters> = {
    direct: emptyCounters(),
    fallback: emptyCounters(),
  };
  private skips = 0;
  private failuresByKind: Partial<Record<DirectFailureKind, number>> = {};

  record(transport: TransportName, durationSeconds: number, success: boolean): void {
    if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
      throw new RangeError(`Duration must be a non-negative number, got ${durationSeconds}`);
    }
    const c = this.counters[transport];
    c.calls++;
    c.totalSeconds += durationSeconds;
    if (success) c.successes++;
    else c.failures++;
  }

  noteDirectSkip(): void {
    this.skips++;
  }

  noteDirectFailure(kind: DirectFailureKind): void {
    this.failuresByKind[kind] = (this.failuresByKind[kind] ?? 0) + 1;
  }

  snapshot(): PerformanceSnapshot {
    const direct = toStats(this.counters.direct);
    const fallback = toStats(this.counters.fallback);
    const totalCalls = direct.calls + fallback.calls;

    const speedImprovement = direct.calls > 0 && fallback.calls > 0 && direct.averageSeconds > 0
      ? fallback.averageSeconds / direct.averageSeconds
      : null;

    return {
      direct,
      fallback,
      totalCalls,
      directShare: totalCalls > 0 ? (direct.calls / totalCalls) * 100 : null,
      fallbackShare: totalCalls > 0 ? (fallback.calls / totalCalls) * 100 : null,
      directSkips: this.skips,
      directFailures: { ...this.failuresByKind },
      speedImprovement,
    };
  }
}

function toStats(c: Counters): TransportStats {
  return {
    ...c,
    averageSeconds: c.calls > 0 ? c.totalSeconds / c.calls : 0,
  };
}
