import type { BoundingBox, LineAxis, MatchPolicy, Point } from "../types";

// --- Geometry Helpers ---

export const getBoxArea = (box: BoundingBox): number => {
  return box.width * box.height;
};

// Calculate center of a bounding box
export const getBoxCenter = (box: BoundingBox): Point => {
  return {
    x: box.x + box.width / 2,
    y: box.y + box.height / 2,
  };
};

// Calculate Euclidean distance between two points
export const getDistance = (p1: Point, p2: Point): number => {
  return Math.sqrt(Math.pow(p1.x - p2.x, 2) + Math.pow(p1.y - p2.y, 2));
};

// Area shared by two boxes; touching edges share nothing
export const getIntersectionArea = (a: BoundingBox, b: BoundingBox): number => {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);

  if (right <= left || bottom <= top) return 0;
  return (right - left) * (bottom - top);
};

// Calculate IoU (Intersection over Union)
export const computeIoU = (a: BoundingBox, b: BoundingBox): number => {
  const intersection = getIntersectionArea(a, b);
  if (intersection === 0) return 0;
  const union = getBoxArea(a) + getBoxArea(b) - intersection;
  return union > 0 ? intersection / union : 0;
};

// Intersection over the smaller of the two boxes. Scores a box nested inside a
// much larger one as a full match, which IoU does not.
export const computeOverlapOverSmaller = (a: BoundingBox, b: BoundingBox): number => {
  const intersection = getIntersectionArea(a, b);
  if (intersection === 0) return 0;
  const smaller = Math.min(getBoxArea(a), getBoxArea(b));
  return smaller > 0 ? intersection / smaller : 0;
};

export const getOverlapScorer = (
  policy: MatchPolicy
): ((a: BoundingBox, b: BoundingBox) => number) => {
  return policy === "overlap-min" ? computeOverlapOverSmaller : computeIoU;
};

// --- Line Crossing ---

// Which side of the line a point is on. A point exactly on the line counts as past it.
export const isPastLine = (point: Point, linePosition: number, axis: LineAxis): boolean => {
  const coordinate = axis === "x" ? point.x : point.y;
  return coordinate >= linePosition;
};

// True when the segment previous -> current changes side of the line, in either direction
export const hasCrossedLine = (
  previous: Point,
  current: Point,
  linePosition: number,
  axis: LineAxis
): boolean => {
  return isPastLine(previous, linePosition, axis) !== isPastLine(current, linePosition, axis);
};

// Order boxes left to right, then top to bottom
export const compareLeftmost = (a: BoundingBox, b: BoundingBox): number => {
  return a.x - b.x || a.y - b.y;
};

export const average = (values: readonly number[]): number | null => {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
};
