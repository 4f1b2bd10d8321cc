import type { CountState, CrossingEvent } from '../types';

interface CountHistoryEntry {
  timestamp: number;
  count: number;
}

export interface VehicleCounterOptions {
  clock?: () => number; // wall time in seconds
}

const wallClockSeconds = (): number => Date.now() / 1000;

/**
 * Counts unique vehicles from line-crossing events. Each track id is counted
 * at most once, even if its event is delivered again. Counted ids live as long
 * as the counter.
 */
export class VehicleCounter {
  private readonly counted = new Set<number>();
  private readonly history: CountHistoryEntry[] = [];
  private readonly clock: () => number;
  private readonly startedAt: number;

  constructor(options: VehicleCounterOptions = {}) {
    this.clock = options.clock ?? wallClockSeconds;
    this.startedAt = this.clock();
  }

  onCrossing(event: CrossingEvent): boolean {
    if (this.counted.has(event.trackId)) {
      console.debug(`[Counter] Track #${event.trackId} already counted, ignoring repeat crossing`);
      return false;
    }
    this.counted.add(event.trackId);
    this.history.push({ timestamp: event.timestamp, count: this.counted.size });
    console.info(`[Counter] Track #${event.trackId} crossed at frame ${event.frameIndex} (total ${this.counted.size})`);
    return true;
  }

  getCount(): number {
    return this.counted.size;
  }

  getState(now: number = this.clock()): CountState {
    const elapsed = now - this.startedAt;
    return {
      uniqueCount: this.counted.size,
      ratePerSecond: elapsed > 0 ? this.counted.size / elapsed : 0,
    };
  }

  // Vehicles per minute over the last `windowSeconds` of stream time, ending at
  // `now` (defaults to the most recent crossing)
  getRatePerMinute(windowSeconds = 60, now?: number): number {
    if (windowSeconds <= 0 || this.history.length === 0) return 0;
    const end = now ?? this.history[this.history.length - 1].timestamp;
    const recent = this.history.filter((h) => h.timestamp <= end && end - h.timestamp < windowSeconds);
    return (recent.length / windowSeconds) * 60;
  }
}
