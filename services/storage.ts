import fs from 'fs/promises';
import path from 'path';
import type { DetectionRecord, SessionSnapshot } from '../types';
import { renderReportHtml } from './reportRenderer';
import type { RecordSink } from './trafficPipeline';

export interface StorageOptions {
  outputDir: string;
  now?: () => Date;
}

export interface SavedFiles {
  detections: string;
  tracks: string;
  distribution: string;
  summary: string;
  report: string;
}

type CsvCell = string | number | boolean | null;

const pad = (n: number): string => n.toString().padStart(2, '0');

// YYYYMMDD_HHMMSS in local time
export function formatSessionId(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

const formatCell = (cell: CsvCell): string => {
  if (cell === null) return '';
  if (typeof cell === 'boolean') return cell ? '1' : '0';
  const text = String(cell);
  return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

export function toCsv(header: readonly string[], rows: readonly (readonly CsvCell[])[]): string {
  return [header, ...rows].map((row) => row.map(formatCell).join(',')).join('\n') + '\n';
}

/**
 * Buffers detection records for the session and writes CSV, JSON and HTML
 * exports into the output directory. Each flush rewrites the files with
 * everything collected so far.
 */
export class SessionStorage implements RecordSink {
  readonly sessionId: string;
  readonly startedAt: Date;
  private readonly records: DetectionRecord[] = [];
  private readonly now: () => Date;

  constructor(private readonly options: StorageOptions) {
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
    this.sessionId = formatSessionId(this.startedAt);
  }

  addDetectionRecords(records: readonly DetectionRecord[]): void {
    for (const record of records) this.records.push(record);
  }

  async flush(snapshot: SessionSnapshot): Promise<SavedFiles> {
    const dir = this.options.outputDir;
    await fs.mkdir(dir, { recursive: true });

    const files: SavedFiles = {
      detections: path.join(dir, `vehicle_data_${this.sessionId}.csv`),
      tracks: path.join(dir, `tracks_${this.sessionId}.csv`),
      distribution: path.join(dir, `speed_distribution_${this.sessionId}.csv`),
      summary: path.join(dir, `summary_${this.sessionId}.json`),
      report: path.join(dir, `report_${this.sessionId}.html`),
    };
    const finishedAt = this.now();

    await Promise.all([
      fs.writeFile(files.detections, this.detectionsCsv(), 'utf8'),
      fs.writeFile(files.tracks, this.tracksCsv(snapshot), 'utf8'),
      fs.writeFile(files.distribution, this.distributionCsv(snapshot), 'utf8'),
      fs.writeFile(files.summary, JSON.stringify(this.summaryJson(snapshot, finishedAt), null, 2), 'utf8'),
      fs.writeFile(
        files.report,
        renderReportHtml(snapshot, { sessionId: this.sessionId, generatedAt: finishedAt }),
        'utf8'
      ),
    ]);

    console.info(`[Storage] Saved ${this.records.length} detection records to ${dir}`);
    return files;
  }

  private detectionsCsv(): string {
    return toCsv(
      ['session_id', 'frame_index', 'timestamp', 'track_id', 'x', 'y', 'width', 'height', 'speed_kmh', 'crossed_line'],
      this.records.map((r) => [
        this.sessionId,
        r.frameIndex,
        r.timestamp,
        r.trackId,
        r.bbox.x,
        r.bbox.y,
        r.bbox.width,
        r.bbox.height,
        r.speedKmh,
        r.crossed,
      ])
    );
  }

  private tracksCsv(snapshot: SessionSnapshot): string {
    return toCsv(
      ['track_id', 'avg_speed_kmh', 'first_seen', 'last_seen', 'first_frame', 'last_frame', 'crossed_line'],
      snapshot.tracks.map((t) => [
        t.trackId,
        t.avgSpeedKmh,
        t.firstSeen,
        t.lastSeen,
        t.firstSeenFrame,
        t.lastSeenFrame,
        t.crossed,
      ])
    );
  }

  private distributionCsv(snapshot: SessionSnapshot): string {
    return toCsv(
      ['bin_start', 'bin_end', 'bin_label', 'count', 'percentage'],
      snapshot.summary.speedDistribution.map((b) => [b.start, b.end, b.label, b.count, b.percentage])
    );
  }

  private summaryJson(snapshot: SessionSnapshot, finishedAt: Date) {
    const { summary } = snapshot;
    return {
      session_id: this.sessionId,
      start_time: this.startedAt.toISOString(),
      end_time: finishedAt.toISOString(),
      unique_count: summary.uniqueCount,
      crossed_line: summary.crossedCount,
      total_tracks: summary.trackCount,
      duration_seconds: summary.duration,
      frames_processed: summary.framesProcessed,
      rate_per_minute: summary.ratePerMinute,
      recent_rate_per_minute: summary.recentRatePerMinute,
      rate_per_second: snapshot.countState.ratePerSecond,
      avg_speed_kmh: summary.speed.avgKmh,
      min_speed_kmh: summary.speed.minKmh,
      max_speed_kmh: summary.speed.maxKmh,
      std_speed_kmh: summary.speed.stdKmh,
      speed_distribution_buckets: summary.speedDistribution,
    };
  }
}
