import type { SpeedEstimate, TrackedVehicle } from '../types';
import { pixelsToMeters } from '../utils/calibration';
import { NonMonotonicTimestampError } from '../utils/errors';
import { average, getDistance } from '../utils/mathUtils';
import { RollingWindow } from '../utils/rollingWindow';

export const MPS_TO_KMH = 3.6;

export interface SpeedSample {
  trackId: number;
  frameIndex: number;
  mps: number;
}

export interface SpeedUpdate {
  samples: SpeedSample[];
  discarded: NonMonotonicTimestampError[];
}

interface TrackSpeedState {
  window: RollingWindow;
  lastFrameIndex: number; // newest history point already turned into a sample
}

/**
 * Turns the last two positions of each track into an instantaneous speed and
 * smooths it over a rolling window of the most recent samples.
 */
export class SpeedAggregator {
  private readonly states = new Map<number, TrackSpeedState>();

  constructor(
    private readonly metersPerPixel: number,
    private readonly windowSize: number,
  ) {}

  update(tracks: readonly TrackedVehicle[]): SpeedUpdate {
    const samples: SpeedSample[] = [];
    const discarded: NonMonotonicTimestampError[] = [];

    for (const track of tracks) {
      const history = track.positionHistory;
      const latest = history[history.length - 1];
      if (!latest) continue;

      let state = this.states.get(track.id);
      if (!state) {
        state = { window: new RollingWindow(this.windowSize), lastFrameIndex: Number.NEGATIVE_INFINITY };
        this.states.set(track.id, state);
      }
      if (state.lastFrameIndex >= latest.frameIndex) continue;
      state.lastFrameIndex = latest.frameIndex;

      if (history.length < 2) continue;
      const previous = history[history.length - 2];

      const elapsedSeconds = latest.timestamp - previous.timestamp;
      if (!(elapsedSeconds > 0)) {
        const error = new NonMonotonicTimestampError(track.id, previous.timestamp, latest.timestamp);
        console.warn(`[Speed] ${error.message}`);
        discarded.push(error);
        continue;
      }

      const meters = pixelsToMeters(getDistance(previous.center, latest.center), this.metersPerPixel);
      const mps = meters / elapsedSeconds;
      state.window.push(mps);
      samples.push({ trackId: track.id, frameIndex: latest.frameIndex, mps });
    }

    return { samples, discarded };
  }

  // null means unknown: the track has no valid sample yet
  getSpeed(trackId: number): SpeedEstimate | null {
    const state = this.states.get(trackId);
    const mps = state ? state.window.average() : null;
    if (state === undefined || mps === null) return null;
    return { mps, kmh: mps * MPS_TO_KMH, sampleCount: state.window.size };
  }

  getAverageSpeedKmh(): number | null {
    const speeds: number[] = [];
    for (const id of this.states.keys()) {
      const speed = this.getSpeed(id);
      if (speed) speeds.push(speed.kmh);
    }
    return average(speeds);
  }

  release(trackId: number): void {
    this.states.delete(trackId);
  }
}
