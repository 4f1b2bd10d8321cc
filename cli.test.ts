import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { main, parseCliArgs } from './cli';

describe('parseCliArgs()', () => {
  it('reads a detections source with calibration and line flags', () => {
    expect(
      parseCliArgs(['--detections', 'run.json', '--meters-per-pixel', '0.02', '--detection-line', '0.5']),
    ).toEqual({
      help: false,
      source: { kind: 'detections', path: 'run.json' },
      configPath: undefined,
      overrides: {
        calibration: { mode: 'scale', metersPerPixel: 0.02 },
        detectionLine: { relativePosition: 0.5 },
      },
    });
  });

  it('defaults the frame rate of a frame directory', () => {
    expect(parseCliArgs(['--frames', 'shots']).source).toEqual({ kind: 'frames', dir: 'shots', fps: 30 });
  });

  it('prefers a reference measurement over a lane width', () => {
    const { overrides } = parseCliArgs([
      '--detections',
      'run.json',
      '--lane-width',
      '3.7',
      '--reference-pixels',
      '350',
      '--reference-meters',
      '3.5',
    ]);

    expect(overrides.calibration).toEqual({ mode: 'reference', referenceSpanPixels: 350, referenceSpanMeters: 3.5 });
  });

  it('leaves unset flags out of the overrides', () => {
    expect(parseCliArgs(['--detections', 'run.json', '--config', 'c.json']).overrides).toEqual({});
  });
});

describe('main()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'tracker-cli-'));
    for (const level of ['log', 'info', 'debug', 'error'] as const) {
      vi.spyOn(console, level).mockImplementation(() => {});
    }
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const writeDetections = async () => {
    const file = path.join(dir, 'detections.json');
    const frames = Array.from({ length: 20 }, (_, f) => ({ frameIndex: f, boxes: [[300, 160 + 5 * f, 40, 40]] }));
    await fs.writeFile(file, JSON.stringify({ fps: 30, frameWidth: 640, frameHeight: 480, frames }));
    return file;
  };

  it('processes a detections file and writes the exports', async () => {
    const file = await writeDetections();
    const outputDir = path.join(dir, 'out');

    const code = await main([
      '--detections',
      file,
      '--meters-per-pixel',
      '0.02',
      '--detection-line',
      '0.5',
      '--output-dir',
      outputDir,
    ]);

    expect(code).toBe(0);
    expect(console.log).toHaveBeenCalledWith('Vehicles counted: 1');
    expect(await fs.readdir(outputDir)).toHaveLength(5);
  });

  it('releases its interrupt handler once the session ends', async () => {
    const file = await writeDetections();
    const before = process.listenerCount('SIGINT');

    expect(await main(['--detections', file, '--meters-per-pixel', '0.02', '--output-dir', dir])).toBe(0);
    expect(process.listenerCount('SIGINT')).toBe(before);
  });

  it('fails without a frame source', async () => {
    expect(await main(['--output-dir', dir])).toBe(1);
    expect(console.error).toHaveBeenCalledTimes(1);
  });

  it('fails on an unknown flag', async () => {
    expect(await main(['--detections', 'run.json', '--speed-limit', '50'])).toBe(1);
  });

  it('reports a bad calibration instead of throwing', async () => {
    const file = await writeDetections();

    expect(await main(['--detections', file, '--meters-per-pixel', '0', '--output-dir', dir])).toBe(1);
    expect(console.error).toHaveBeenCalledWith('[CLI] Meters per pixel must be positive, got 0');
  });
});
