import type { Calibration } from '../types';
import { InvalidCalibrationError } from './errors';

/*
 * Pixel-to-meter conversion uses one constant scale for the whole frame. That
 * is a modeling simplification: it assumes no lens distortion and a flat road
 * at a uniform distance from the camera. Vehicles far from the reference span
 * get proportionally less accurate speeds.
 */

export const DEFAULT_LANE_WIDTH_METERS = 3.5;
// With no measured lane, one lane is assumed to span a third of the frame width
export const DEFAULT_LANE_FRACTION = 1 / 3;

export type CalibrationSettings =
  | { mode: 'reference'; referenceSpanPixels: number; referenceSpanMeters: number }
  | { mode: 'lane'; laneWidthMeters: number; laneSpanPixels?: number; laneFraction?: number }
  | { mode: 'scale'; metersPerPixel: number };

const isPositive = (value: number): boolean => Number.isFinite(value) && value > 0;

export function computeScale(referencePixelSpan: number, referenceRealSpanMeters: number): number {
  if (!isPositive(referencePixelSpan)) {
    throw new InvalidCalibrationError(
      `Reference pixel span must be positive, got ${referencePixelSpan}`,
      referencePixelSpan,
      referenceRealSpanMeters,
    );
  }
  if (!isPositive(referenceRealSpanMeters)) {
    throw new InvalidCalibrationError(
      `Reference real span must be positive, got ${referenceRealSpanMeters} m`,
      referencePixelSpan,
      referenceRealSpanMeters,
    );
  }
  return referenceRealSpanMeters / referencePixelSpan;
}

export function pixelsToMeters(pixelDistance: number, metersPerPixel: number): number {
  return pixelDistance * metersPerPixel;
}

export function metersToPixels(meters: number, metersPerPixel: number): number {
  return meters / metersPerPixel;
}

export function calibrateFromLaneWidth(
  frameWidth: number,
  laneWidthMeters: number = DEFAULT_LANE_WIDTH_METERS,
  laneFraction: number = DEFAULT_LANE_FRACTION,
): number {
  if (!isPositive(laneFraction) || laneFraction > 1) {
    throw new InvalidCalibrationError(`Lane fraction must be in (0, 1], got ${laneFraction}`);
  }
  return computeScale(frameWidth * laneFraction, laneWidthMeters);
}

function resolveScale(settings: CalibrationSettings, frameWidth: number): number {
  switch (settings.mode) {
    case 'reference':
      return computeScale(settings.referenceSpanPixels, settings.referenceSpanMeters);
    case 'lane':
      return settings.laneSpanPixels !== undefined
        ? computeScale(settings.laneSpanPixels, settings.laneWidthMeters)
        : calibrateFromLaneWidth(frameWidth, settings.laneWidthMeters, settings.laneFraction);
    case 'scale':
      if (!isPositive(settings.metersPerPixel)) {
        throw new InvalidCalibrationError(
          `Meters per pixel must be positive, got ${settings.metersPerPixel}`,
        );
      }
      return settings.metersPerPixel;
  }
}

export function resolveCalibration(settings: CalibrationSettings, frameWidth: number): Calibration {
  return Object.freeze({ metersPerPixel: resolveScale(settings, frameWidth) });
}
