import { describe, expect, it } from 'vitest';
import type { SessionSnapshot } from '../types';
import { renderReportHtml } from './reportRenderer';

const emptySnapshot: SessionSnapshot = {
  summary: {
    uniqueCount: 0,
    crossedCount: 0,
    trackCount: 0,
    duration: 0,
    framesProcessed: 0,
    ratePerMinute: 0,
    recentRatePerMinute: 0,
    speed: { avgKmh: null, minKmh: null, maxKmh: null, stdKmh: null },
    speedDistribution: [],
  },
  tracks: [],
  liveTracks: [],
  activeTrackCount: 0,
  liveAverageSpeedKmh: null,
  countState: { uniqueCount: 0, ratePerSecond: 0 },
  frameSize: { width: 640, height: 480 },
  metersPerPixel: 0.02,
  linePosition: 240,
  lineAxis: 'y',
};

const busySnapshot: SessionSnapshot = {
  ...emptySnapshot,
  summary: {
    ...emptySnapshot.summary,
    uniqueCount: 1,
    crossedCount: 1,
    trackCount: 1,
    duration: 75,
    framesProcessed: 20,
    ratePerMinute: 0.8,
    recentRatePerMinute: 1,
    speed: { avgKmh: 10.8, minKmh: 10.8, maxKmh: 10.8, stdKmh: 0 },
    speedDistribution: [{ start: 10, end: 15, label: '10-15 km/h', count: 1, percentage: 100 }],
  },
  tracks: [
    {
      trackId: 1,
      avgSpeedKmh: 10.8,
      firstSeen: 0,
      lastSeen: 0.625,
      firstSeenFrame: 0,
      lastSeenFrame: 19,
      crossed: true,
    },
  ],
  activeTrackCount: 1,
  liveAverageSpeedKmh: 10.8,
  liveTracks: [
    {
      id: 1,
      box: { x: 300, y: 250, width: 40, height: 40 },
      positionHistory: [
        { center: { x: 320, y: 265 }, frameIndex: 18, timestamp: 0.6 },
        { center: { x: 320, y: 270 }, frameIndex: 19, timestamp: 0.625 },
      ],
      firstSeenFrame: 0,
      firstSeenTimestamp: 0,
      lastSeenFrame: 19,
      lastSeenTimestamp: 0.625,
      disappearedCount: 0,
      crossed: true,
    },
  ],
};

const meta = { sessionId: '20240102_030405', generatedAt: new Date(Date.UTC(2024, 0, 2, 3, 4, 5)) };

describe('renderReportHtml()', () => {
  it('produces a standalone page titled after the session', () => {
    const html = renderReportHtml(emptySnapshot, meta);

    expect(html.startsWith('<!DOCTYPE html>')).toBe(true);
    expect(html).toContain('<title>Traffic Tracker - 20240102_030405</title>');
    expect(html).toContain('Session 20240102_030405 · 2024-01-02T03:04:05.000Z');
  });

  it('says so when no speeds were measured', () => {
    const html = renderReportHtml(emptySnapshot, meta);

    expect(html).toContain('No speed samples recorded.');
    expect(html).toContain('unknown');
  });

  it('draws the detection line across the frame', () => {
    const html = renderReportHtml(emptySnapshot, meta);

    expect(html).toContain('viewBox="0 0 640 480"');
    expect(html).toContain('x1="0" y1="240" x2="640" y2="240"');
  });

  it('draws a 10 m reference span from the calibration', () => {
    const html = renderReportHtml(emptySnapshot, meta);

    // 10 m at 0.02 m/px is 500px
    expect(html).toContain('x1="20" y1="460" x2="520" y2="460"');
    expect(html).toContain('>10 m</text>');
  });

  it('labels live tracks and their trajectories', () => {
    const html = renderReportHtml(busySnapshot, meta);

    expect(html).toContain('data-track-id="1"');
    expect(html).toContain('>ID:1 10.8 km/h</text>');
    expect(html).toContain('points="320,265 320,270"');
  });

  it('lists buckets, stats and tracks', () => {
    const html = renderReportHtml(busySnapshot, meta);

    expect(html).toContain('data-bucket="10-15 km/h"');
    expect(html).toContain('1 (100%)');
    expect(html).toContain('>1:15</div>');
    expect(html).toContain('<td>0.00s - 0.63s</td>');
    expect(html).toContain('<td>yes</td>');
    expect(html).toContain('Last minute</div><div class="text-2xl font-mono text-neon-green">1.0</div>');
    expect(html).toContain('Active: <span class="text-white">1</span>');
    expect(html).toContain('Live avg: <span class="text-white">10.8 km/h</span>');
    expect(html).not.toContain('No speed samples recorded.');
  });
});
