import type { BoundingBox } from '../types';

export class TrafficTrackerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Calibration inputs that cannot produce a positive meters-per-pixel scale. Fatal. */
export class InvalidCalibrationError extends TrafficTrackerError {
  constructor(
    message: string,
    readonly pixelSpan?: number,
    readonly realSpanMeters?: number,
  ) {
    super(message);
  }
}

/** A speed sample whose two positions do not move forward in time. Only that sample is dropped. */
export class NonMonotonicTimestampError extends TrafficTrackerError {
  constructor(
    readonly trackId: number,
    readonly previousTimestamp: number,
    readonly currentTimestamp: number,
  ) {
    super(
      `Track #${trackId}: timestamp ${currentTimestamp} does not follow ${previousTimestamp}; speed sample discarded`,
    );
  }
}

/** A detection with non-positive width or height. It is dropped before matching. */
export class DegenerateDetectionError extends TrafficTrackerError {
  constructor(
    readonly box: BoundingBox,
    readonly frameIndex: number,
  ) {
    super(
      `Frame ${frameIndex}: degenerate box ${box.width}x${box.height} at (${box.x}, ${box.y}) dropped`,
    );
  }
}

export class FrameOrderError extends TrafficTrackerError {
  constructor(
    readonly frameIndex: number,
    readonly lastFrameIndex: number,
  ) {
    super(`Frame ${frameIndex} received after frame ${lastFrameIndex}; frames must strictly increase`);
  }
}

export class ConfigurationError extends TrafficTrackerError {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
  }
}
