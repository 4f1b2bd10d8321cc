export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export interface Detection {
  boundingBox: BoundingBox;
  frameIndex: number;
  timestamp: number; // seconds
}

export interface PositionSample {
  center: Point;
  frameIndex: number;
  timestamp: number;
}

export interface TrackedVehicle {
  id: number;
  box: BoundingBox;
  positionHistory: PositionSample[]; // most recent last
  firstSeenFrame: number;
  firstSeenTimestamp: number;
  lastSeenFrame: number;
  lastSeenTimestamp: number;
  disappearedCount: number;
  crossed: boolean;
}

export interface CrossingEvent {
  trackId: number;
  frameIndex: number;
  timestamp: number;
}

export type LineAxis = 'y' | 'x';

export interface DetectionLine {
  relativePosition: number; // (0, 1) of the frame height ('y') or width ('x')
  axis: LineAxis;
}

export interface FrameSize {
  width: number;
  height: number;
}

export interface Calibration {
  metersPerPixel: number;
}

export type MatchPolicy = 'iou' | 'overlap-min';

export interface SpeedEstimate {
  mps: number;
  kmh: number;
  sampleCount: number;
}

export interface CountState {
  uniqueCount: number;
  ratePerSecond: number;
}

// --- Records handed to storage ---

export interface DetectionRecord {
  trackId: number;
  frameIndex: number;
  timestamp: number;
  bbox: BoundingBox;
  speedKmh: number | null;
  crossed: boolean;
}

export interface TrackSummary {
  trackId: number;
  avgSpeedKmh: number | null;
  firstSeen: number; // timestamp, seconds
  lastSeen: number;
  firstSeenFrame: number;
  lastSeenFrame: number;
  crossed: boolean;
}

export interface SpeedBucket {
  start: number;
  end: number;
  label: string;
  count: number;
  percentage: number;
}

export interface SpeedStats {
  avgKmh: number | null;
  minKmh: number | null;
  maxKmh: number | null;
  stdKmh: number | null;
}

export interface SessionSummary {
  uniqueCount: number;
  crossedCount: number;
  trackCount: number;
  duration: number; // seconds between the first and last processed frame
  framesProcessed: number;
  ratePerMinute: number; // over the whole session
  recentRatePerMinute: number; // over the last minute of stream time
  speed: SpeedStats;
  speedDistribution: SpeedBucket[];
}

export interface SessionSnapshot {
  summary: SessionSummary;
  tracks: TrackSummary[];
  liveTracks: readonly TrackedVehicle[];
  activeTrackCount: number;
  liveAverageSpeedKmh: number | null;
  countState: CountState;
  frameSize: FrameSize;
  metersPerPixel: number;
  linePosition: number;
  lineAxis: LineAxis;
}
