import React from 'react';
import type { FrameSize, LineAxis, TrackedVehicle, TrackSummary } from '../types';
import { metersToPixels } from '../utils/calibration';
import { formatSpeed, getTrackColor } from '../utils/format';

const SCALE_BAR_METERS = 10;
const SCALE_BAR_MARGIN = 20;

interface TrackOverlayProps {
  tracks: readonly TrackedVehicle[];
  summaries: readonly TrackSummary[];
  frameSize: FrameSize;
  metersPerPixel: number;
  linePosition: number;
  lineAxis: LineAxis;
}

export const TrackOverlay: React.FC<TrackOverlayProps> = ({
  tracks,
  summaries,
  frameSize,
  metersPerPixel,
  linePosition,
  lineAxis,
}) => {
  const speedById = new Map(summaries.map((s) => [s.trackId, s.avgSpeedKmh]));
  const { width, height } = frameSize;

  // Detection line spans the full frame on the other axis
  const line =
    lineAxis === 'y'
      ? { x1: 0, y1: linePosition, x2: width, y2: linePosition }
      : { x1: linePosition, y1: 0, x2: linePosition, y2: height };

  // Calibrated reference span in the bottom-left corner
  const scaleLength = Math.round(metersToPixels(SCALE_BAR_METERS, metersPerPixel));
  const scaleY = height - SCALE_BAR_MARGIN;

  return (
    <svg
      viewBox={`0 0 ${width} ${height}`}
      className="w-full h-auto bg-black border border-gray-800 rounded-lg"
      xmlns="http://www.w3.org/2000/svg"
    >
      <line {...line} stroke="rgba(255, 0, 85, 0.9)" strokeWidth={3} data-role="detection-line" />
      <g data-role="scale-bar">
        <line
          x1={SCALE_BAR_MARGIN}
          y1={scaleY}
          x2={SCALE_BAR_MARGIN + scaleLength}
          y2={scaleY}
          stroke="#ffcc00"
          strokeWidth={2}
        />
        <text x={SCALE_BAR_MARGIN} y={scaleY - 6} fill="#ffcc00" fontSize={12} fontFamily="monospace">
          {`${SCALE_BAR_METERS} m`}
        </text>
      </g>

      {tracks.map((track) => {
        const color = getTrackColor(track.id);
        const { x, y, width: boxW, height: boxH } = track.box;
        const trajectory = track.positionHistory.map((p) => `${p.center.x},${p.center.y}`).join(' ');
        const label = `ID:${track.id} ${formatSpeed(speedById.get(track.id) ?? null)}`;

        return (
          <g key={track.id} data-track-id={track.id} opacity={track.disappearedCount > 0 ? 0.4 : 1}>
            <rect x={x} y={y} width={boxW} height={boxH} fill="none" stroke={color} strokeWidth={2} />
            {track.positionHistory.length > 1 && (
              <polyline points={trajectory} fill="none" stroke={color} strokeWidth={2} />
            )}
            <text x={x} y={Math.max(12, y - 5)} fill={color} fontSize={14} fontFamily="monospace" fontWeight="bold">
              {label}
            </text>
          </g>
        );
      })}
    </svg>
  );
};
