import type { PipelineConfig } from '../config';
import type {
  BoundingBox,
  Calibration,
  CrossingEvent,
  Detection,
  DetectionRecord,
  SessionSnapshot,
  SessionSummary,
  SpeedEstimate,
  TrackedVehicle,
  TrackSummary,
} from '../types';
import { resolveCalibration } from '../utils/calibration';
import type { DegenerateDetectionError, NonMonotonicTimestampError } from '../utils/errors';
import { buildSpeedDistribution, summarizeSpeeds } from '../utils/speedStats';
import { VehicleCounter } from './counter';
import { SpeedAggregator, type SpeedSample } from './speedAggregator';
import { VehicleTracker } from './tracker';

const RECENT_RATE_WINDOW_SECONDS = 60;

/** Where per-frame detection records go. Implemented by SessionStorage. */
export interface RecordSink {
  addDetectionRecords(records: readonly DetectionRecord[]): void;
}

export interface PipelineDependencies {
  sink?: RecordSink;
  clock?: () => number; // wall time in seconds, for the counter's rate
}

export interface FrameResult {
  frameIndex: number;
  timestamp: number;
  tracks: readonly TrackedVehicle[];
  crossings: CrossingEvent[];
  samples: SpeedSample[];
  records: DetectionRecord[];
  created: number[];
  removed: number[];
  rejected: DegenerateDetectionError[];
  discarded: NonMonotonicTimestampError[];
  uniqueCount: number;
}

/**
 * One frame in, one FrameResult out: Tracker, then Speed Aggregator, then
 * Counter, then the record sink. Frames must arrive in increasing order.
 */
export class TrafficPipeline {
  readonly calibration: Calibration;
  readonly tracker: VehicleTracker;
  readonly speeds: SpeedAggregator;
  readonly counter: VehicleCounter;
  private readonly summaries = new Map<number, TrackSummary>();
  private readonly sink?: RecordSink;
  private firstTimestamp: number | null = null;
  private lastTimestamp: number | null = null;
  private framesProcessed = 0;

  constructor(
    readonly config: PipelineConfig,
    deps: PipelineDependencies = {},
  ) {
    // Throws InvalidCalibrationError before any state is built
    this.calibration = resolveCalibration(config.calibration, config.frameWidth);
    this.tracker = new VehicleTracker({
      matchThreshold: config.matchThreshold,
      matchPolicy: config.matchPolicy,
      maxDisappearedFrames: config.maxDisappearedFrames,
      historyLength: config.speedSmoothingWindow + 1,
      detectionLine: config.detectionLine,
      frameSize: { width: config.frameWidth, height: config.frameHeight },
    });
    this.speeds = new SpeedAggregator(this.calibration.metersPerPixel, config.speedSmoothingWindow);
    this.counter = new VehicleCounter({ clock: deps.clock });
    this.sink = deps.sink;
    console.info(
      `[Pipeline] ${this.calibration.metersPerPixel.toFixed(5)} m/px, detection line at ${this.tracker.getLinePosition()}px (${config.detectionLine.axis})`,
    );
  }

  processFrame(boxes: readonly BoundingBox[], frameIndex: number, timestamp: number): FrameResult {
    const detections: Detection[] = boxes.map((boundingBox) => ({ boundingBox, frameIndex, timestamp }));
    const update = this.tracker.update(detections, frameIndex, timestamp);
    const { samples, discarded } = this.speeds.update(update.tracks);

    for (const track of update.removed) {
      this.recordSummary(track, this.speeds.getSpeed(track.id));
      this.speeds.release(track.id);
    }
    for (const event of update.crossings) {
      this.counter.onCrossing(event);
    }

    const records: DetectionRecord[] = [];
    for (const track of update.tracks) {
      const speed = this.speeds.getSpeed(track.id);
      this.recordSummary(track, speed);
      if (track.lastSeenFrame !== frameIndex) continue;
      records.push({
        trackId: track.id,
        frameIndex,
        timestamp,
        bbox: { ...track.box },
        speedKmh: speed ? speed.kmh : null,
        crossed: track.crossed,
      });
    }
    this.sink?.addDetectionRecords(records);

    this.firstTimestamp ??= timestamp;
    this.lastTimestamp = timestamp;
    this.framesProcessed++;

    return {
      frameIndex,
      timestamp,
      tracks: update.tracks,
      crossings: update.crossings,
      samples,
      records,
      created: update.created,
      removed: update.removed.map((t) => t.id),
      rejected: update.rejected,
      discarded,
      uniqueCount: this.counter.getCount(),
    };
  }

  getTrackSummaries(): TrackSummary[] {
    return [...this.summaries.values()].sort((a, b) => a.trackId - b.trackId);
  }

  getSessionSummary(): SessionSummary {
    const tracks = this.getTrackSummaries();
    const speedsKmh = tracks.flatMap((t) => (t.avgSpeedKmh === null ? [] : [t.avgSpeedKmh]));
    const duration =
      this.firstTimestamp === null || this.lastTimestamp === null ? 0 : this.lastTimestamp - this.firstTimestamp;
    const uniqueCount = this.counter.getCount();

    return {
      uniqueCount,
      crossedCount: tracks.filter((t) => t.crossed).length,
      trackCount: tracks.length,
      duration,
      framesProcessed: this.framesProcessed,
      ratePerMinute: duration > 0 ? (uniqueCount / duration) * 60 : 0,
      recentRatePerMinute: this.counter.getRatePerMinute(RECENT_RATE_WINDOW_SECONDS, this.lastTimestamp ?? undefined),
      speed: summarizeSpeeds(speedsKmh),
      speedDistribution: buildSpeedDistribution(speedsKmh, this.config.speedBucketWidthKmh),
    };
  }

  getSnapshot(): SessionSnapshot {
    return {
      summary: this.getSessionSummary(),
      tracks: this.getTrackSummaries(),
      liveTracks: this.tracker.getTracks(),
      activeTrackCount: this.tracker.getActiveTracks().length,
      liveAverageSpeedKmh: this.speeds.getAverageSpeedKmh(),
      countState: this.counter.getState(),
      frameSize: { width: this.config.frameWidth, height: this.config.frameHeight },
      metersPerPixel: this.calibration.metersPerPixel,
      linePosition: this.tracker.getLinePosition(),
      lineAxis: this.config.detectionLine.axis,
    };
  }

  private recordSummary(track: TrackedVehicle, speed: SpeedEstimate | null): void {
    this.summaries.set(track.id, {
      trackId: track.id,
      avgSpeedKmh: speed ? speed.kmh : null,
      firstSeen: track.firstSeenTimestamp,
      lastSeen: track.lastSeenTimestamp,
      firstSeenFrame: track.firstSeenFrame,
      lastSeenFrame: track.lastSeenFrame,
      crossed: track.crossed,
    });
  }
}
