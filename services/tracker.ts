import type {
  BoundingBox,
  CrossingEvent,
  Detection,
  DetectionLine,
  FrameSize,
  MatchPolicy,
  TrackedVehicle,
} from '../types';
import { DegenerateDetectionError, FrameOrderError } from '../utils/errors';
import {
  compareLeftmost,
  getBoxCenter,
  getOverlapScorer,
  hasCrossedLine,
} from '../utils/mathUtils';

export interface TrackerOptions {
  matchThreshold: number;
  matchPolicy: MatchPolicy;
  maxDisappearedFrames: number;
  historyLength: number; // positions kept per track, at least 2
  detectionLine: DetectionLine;
  frameSize: FrameSize;
}

export interface TrackerUpdate {
  tracks: readonly TrackedVehicle[]; // live set after this frame, ascending id
  crossings: CrossingEvent[];
  created: number[];
  removed: readonly TrackedVehicle[]; // final state of tracks retired this frame
  rejected: DegenerateDetectionError[];
}

interface Candidate {
  detection: Detection;
  index: number; // position in the input, last tie-break
}

interface ScoredPair {
  track: TrackedVehicle;
  candidate: Candidate;
  score: number;
}

const isDegenerate = (box: BoundingBox): boolean =>
  !(Number.isFinite(box.width) && Number.isFinite(box.height) && box.width > 0 && box.height > 0);

const compareCandidates = (a: Candidate, b: Candidate): number =>
  compareLeftmost(a.detection.boundingBox, b.detection.boundingBox) || a.index - b.index;

const snapshot = (track: TrackedVehicle): TrackedVehicle => ({
  ...track,
  box: { ...track.box },
  positionHistory: track.positionHistory.map((p) => ({ ...p, center: { ...p.center } })),
});

/**
 * Keeps vehicle identities across frames by greedy overlap matching and flags
 * each track the first time its center crosses the detection line.
 *
 * A vehicle that stays unmatched for more than `maxDisappearedFrames` frames is
 * retired for good. If it shows up again it gets a new id.
 */
export class VehicleTracker {
  private readonly tracks = new Map<number, TrackedVehicle>();
  private readonly score: (a: BoundingBox, b: BoundingBox) => number;
  private readonly linePosition: number;
  private readonly historyLength: number;
  private nextId = 1;
  private lastFrameIndex: number | null = null;

  constructor(private readonly options: TrackerOptions) {
    const { relativePosition, axis } = options.detectionLine;
    if (!(relativePosition > 0 && relativePosition < 1)) {
      throw new RangeError(`Detection line position must be in (0, 1), got ${relativePosition}`);
    }
    this.score = getOverlapScorer(options.matchPolicy);
    this.linePosition =
      relativePosition * (axis === 'x' ? options.frameSize.width : options.frameSize.height);
    this.historyLength = Math.max(2, options.historyLength);
  }

  update(detections: readonly Detection[], frameIndex: number, timestamp: number): TrackerUpdate {
    if (this.lastFrameIndex !== null && frameIndex <= this.lastFrameIndex) {
      throw new FrameOrderError(frameIndex, this.lastFrameIndex);
    }
    this.lastFrameIndex = frameIndex;

    // 1. Drop boxes that cannot be matched or tracked
    const rejected: DegenerateDetectionError[] = [];
    const candidates: Candidate[] = [];
    detections.forEach((detection, index) => {
      if (isDegenerate(detection.boundingBox)) {
        const error = new DegenerateDetectionError(detection.boundingBox, frameIndex);
        console.warn(`[Tracker] ${error.message}`);
        rejected.push(error);
      } else {
        candidates.push({ detection, index });
      }
    });

    // 2. Score every (track, detection) pair above the threshold
    const pairs: ScoredPair[] = [];
    for (const track of this.tracks.values()) {
      for (const candidate of candidates) {
        const score = this.score(track.box, candidate.detection.boundingBox);
        if (score > this.options.matchThreshold) {
          pairs.push({ track, candidate, score });
        }
      }
    }
    pairs.sort(
      (a, b) =>
        b.score - a.score ||
        a.track.id - b.track.id ||
        compareCandidates(a.candidate, b.candidate)
    );

    // 3. Greedy assignment, best pair first
    const matchedTracks = new Set<number>();
    const matchedCandidates = new Set<Candidate>();
    for (const { track, candidate } of pairs) {
      if (matchedTracks.has(track.id) || matchedCandidates.has(candidate)) continue;
      matchedTracks.add(track.id);
      matchedCandidates.add(candidate);
      this.applyMatch(track, candidate.detection.boundingBox, frameIndex, timestamp);
    }

    // 4. Age out tracks that found no detection
    const removed: TrackedVehicle[] = [];
    for (const track of this.tracks.values()) {
      if (matchedTracks.has(track.id)) continue;
      track.disappearedCount++;
      if (track.disappearedCount > this.options.maxDisappearedFrames) {
        this.tracks.delete(track.id);
        removed.push(snapshot(track));
        console.info(
          `[Tracker] Track #${track.id} retired after ${track.disappearedCount} missed frames (last seen frame ${track.lastSeenFrame})`
        );
      }
    }

    // 5. Leftover detections become new vehicles, leftmost first
    const created: number[] = [];
    const unmatched = candidates.filter((c) => !matchedCandidates.has(c)).sort(compareCandidates);
    for (const candidate of unmatched) {
      created.push(this.register(candidate.detection.boundingBox, frameIndex, timestamp));
    }

    // 6. Line crossings for tracks that moved this frame
    const crossings: CrossingEvent[] = [];
    for (const id of [...matchedTracks].sort((a, b) => a - b)) {
      const track = this.tracks.get(id);
      if (!track || track.crossed || track.positionHistory.length < 2) continue;

      const history = track.positionHistory;
      const previous = history[history.length - 2];
      const current = history[history.length - 1];
      if (hasCrossedLine(previous.center, current.center, this.linePosition, this.options.detectionLine.axis)) {
        track.crossed = true;
        crossings.push({ trackId: track.id, frameIndex, timestamp });
      }
    }

    return { tracks: this.getTracks(), crossings, created, removed, rejected };
  }

  getTracks(): TrackedVehicle[] {
    return [...this.tracks.values()].map(snapshot);
  }

  getTrack(id: number): TrackedVehicle | undefined {
    const track = this.tracks.get(id);
    return track ? snapshot(track) : undefined;
  }

  // Tracks matched to a detection in the latest frame, including ones created in it
  getActiveTracks(): TrackedVehicle[] {
    return this.getTracks().filter((t) => t.disappearedCount === 0);
  }

  getLinePosition(): number {
    return this.linePosition;
  }

  private applyMatch(track: TrackedVehicle, box: BoundingBox, frameIndex: number, timestamp: number): void {
    track.box = { ...box };
    track.positionHistory.push({ center: getBoxCenter(box), frameIndex, timestamp });
    if (track.positionHistory.length > this.historyLength) {
      track.positionHistory.splice(0, track.positionHistory.length - this.historyLength);
    }
    track.lastSeenFrame = frameIndex;
    track.lastSeenTimestamp = timestamp;
    track.disappearedCount = 0;
  }

  private register(box: BoundingBox, frameIndex: number, timestamp: number): number {
    const id = this.nextId++;
    this.tracks.set(id, {
      id,
      box: { ...box },
      positionHistory: [{ center: getBoxCenter(box), frameIndex, timestamp }],
      firstSeenFrame: frameIndex,
      firstSeenTimestamp: timestamp,
      lastSeenFrame: frameIndex,
      lastSeenTimestamp: timestamp,
      disappearedCount: 0,
      crossed: false,
    });
    console.debug(`[Tracker] Track #${id} created at frame ${frameIndex}`);
    return id;
  }
}
