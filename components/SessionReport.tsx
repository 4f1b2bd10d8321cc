import React from 'react';
import type { SessionSummary, TrackSummary } from '../types';
import { formatDuration, formatSpeed, getTrackColor } from '../utils/format';

interface SessionReportProps {
  summary: SessionSummary;
  tracks: readonly TrackSummary[];
}

const StatCard: React.FC<{ label: string; value: string; accent: string }> = ({ label, value, accent }) => (
  <div className="bg-panel-bg p-4 rounded-xl border border-gray-800">
    <div className="text-gray-500 text-xs uppercase tracking-wider mb-1">{label}</div>
    <div className={`text-2xl font-mono ${accent}`}>{value}</div>
  </div>
);

export const SessionReport: React.FC<SessionReportProps> = ({ summary, tracks }) => {
  const largestBucket = Math.max(1, ...summary.speedDistribution.map((b) => b.count));

  return (
    <aside className="flex flex-col gap-4">
      {/* Stats Cards */}
      <div className="grid grid-cols-2 gap-4">
        <StatCard label="Vehicles counted" value={String(summary.uniqueCount)} accent="text-neon-blue" />
        <StatCard label="Per minute" value={summary.ratePerMinute.toFixed(1)} accent="text-neon-green" />
        <StatCard label="Last minute" value={summary.recentRatePerMinute.toFixed(1)} accent="text-neon-green" />
        <StatCard label="Average speed" value={formatSpeed(summary.speed.avgKmh)} accent="text-white" />
        <StatCard label="Duration" value={formatDuration(summary.duration)} accent="text-white" />
      </div>

      <div className="bg-panel-bg p-6 rounded-xl border border-gray-800">
        <h3 className="text-lg font-bold text-white mb-6 border-b border-gray-800 pb-4">Speed Distribution</h3>
        {summary.speedDistribution.length === 0 ? (
          <p className="text-gray-500 text-sm">No speed samples recorded.</p>
        ) : (
          <div className="flex flex-col gap-4">
            {summary.speedDistribution.map((bucket) => (
              <div key={bucket.label} data-bucket={bucket.label}>
                <div className="flex justify-between items-end mb-2">
                  <span className="text-gray-400">{bucket.label}</span>
                  <span className="font-bold text-neon-blue">{`${bucket.count} (${bucket.percentage}%)`}</span>
                </div>
                <div className="w-full bg-gray-800 h-2 rounded-full overflow-hidden">
                  <div
                    className="bg-neon-blue h-full"
                    style={{ width: `${(bucket.count / largestBucket) * 100}%` }}
                  ></div>
                </div>
              </div>
            ))}
          </div>
        )}
      </div>

      <div className="bg-panel-bg p-4 rounded-xl border border-gray-800 text-xs font-mono text-gray-400">
        <table className="w-full">
          <thead>
            <tr className="text-gray-500 text-left">
              <th>Track</th>
              <th>Speed</th>
              <th>Seen</th>
              <th>Crossed</th>
            </tr>
          </thead>
          <tbody>
            {tracks.map((track) => (
              <tr key={track.trackId} data-track-id={track.trackId}>
                <td style={{ color: getTrackColor(track.trackId) }}>{`#${track.trackId}`}</td>
                <td>{formatSpeed(track.avgSpeedKmh)}</td>
                <td>{`${track.firstSeen.toFixed(2)}s - ${track.lastSeen.toFixed(2)}s`}</td>
                <td>{track.crossed ? 'yes' : 'no'}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </div>
    </aside>
  );
};
