import { SessionReport } from './components/SessionReport';
import { TrackOverlay } from './components/TrackOverlay';
import type { SessionSnapshot } from './types';
import { formatSpeed } from './utils/format';

interface AppProps {
  snapshot: SessionSnapshot;
  sessionId: string;
  generatedAt: Date;
}

export default function App({ snapshot, sessionId, generatedAt }: AppProps) {
  const { summary } = snapshot;

  return (
    <div className="min-h-screen bg-dark-bg text-gray-200 font-sans flex flex-col">
      {/* Header */}
      <header className="border-b border-gray-800 bg-panel-bg p-4 flex justify-between items-center">
        <div className="flex items-center gap-2">
          <div className="w-8 h-8 rounded bg-gradient-to-tr from-neon-blue to-purple-600 flex items-center justify-center font-bold text-black">
            TT
          </div>
          <h1 className="text-xl font-bold tracking-tight text-white">
            Traffic Tracker <span className="text-neon-blue font-light">Session Report</span>
          </h1>
        </div>
        <div className="text-sm text-gray-400 font-mono">{`Session ${sessionId} · ${generatedAt.toISOString()}`}</div>
      </header>

      {/* Main Content */}
      <main className="flex-1 p-4 grid grid-cols-1 lg:grid-cols-4 gap-6">
        <section className="lg:col-span-3 flex flex-col gap-4">
          <TrackOverlay
            tracks={snapshot.liveTracks}
            summaries={snapshot.tracks}
            frameSize={snapshot.frameSize}
            metersPerPixel={snapshot.metersPerPixel}
            linePosition={snapshot.linePosition}
            lineAxis={snapshot.lineAxis}
          />
          <div className="h-16 bg-panel-bg rounded-lg border border-gray-800 flex items-center px-6 gap-6 text-sm text-gray-400">
            <div>Frames: <span className="text-white">{summary.framesProcessed}</span></div>
            <div>Tracks: <span className="text-white">{summary.trackCount}</span></div>
            <div>Crossed: <span className="text-white">{summary.crossedCount}</span></div>
            <div>Active: <span className="text-white">{snapshot.activeTrackCount}</span></div>
            <div>Live avg: <span className="text-white">{formatSpeed(snapshot.liveAverageSpeedKmh)}</span></div>
          </div>
        </section>

        <div className="lg:col-span-1">
          <SessionReport summary={summary} tracks={snapshot.tracks} />
        </div>
      </main>
    </div>
  );
}
