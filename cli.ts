import { pathToFileURL } from 'url';
import { parseArgs } from 'util';
import { loadConfig, type ConfigInput, type PipelineConfig } from './config';
import { detectFrames, listFrameImages, loadDetectionsFile, type FrameInput } from './services/frameSource';
import { GeminiVehicleDetector } from './services/geminiService';
import { runSession, type SessionResult } from './services/sessionRunner';
import { TrafficTrackerError } from './utils/errors';
import { formatSpeed } from './utils/format';

export const USAGE = `Usage: traffic-tracker (--detections <file.json> | --frames <dir>) [options]

  --detections <file>        per-frame boxes as JSON
  --frames <dir>             directory of JPEG frames, detected with Gemini (needs API_KEY)
  --fps <n>                  frame rate for --frames (default 30)
  --config <file>            JSON config file
  --output-dir <dir>         where exports are written (default data)
  --detection-line <0-1>     relative line position (default 0.6)
  --line-axis <y|x>          y: horizontal line, x: vertical line (default y)
  --lane-width <m>           lane width used for calibration (default 3.5)
  --reference-pixels <px>    measured reference span in pixels
  --reference-meters <m>     real length of the reference span
  --meters-per-pixel <s>     precomputed scale
  --min-area <px2>           smallest box the detector keeps (default 500)
  --match-threshold <0-1>    minimum overlap to continue a track (default 0.3)
  --match-policy <p>         iou | overlap-min (default iou)
  --max-disappeared <n>      missed frames before a track is retired (default 10)
  --smoothing-window <n>     speed samples averaged per track (default 5)
  --frame-width <px>         frame width
  --frame-height <px>        frame height
  -h, --help                 show this help
`;

export type FrameSourceArg =
  | { kind: 'detections'; path: string }
  | { kind: 'frames'; dir: string; fps: number };

export interface CliArgs {
  help: boolean;
  source: FrameSourceArg | null;
  configPath?: string;
  overrides: Record<string, unknown>;
}

const toNumber = (value: string | undefined): number | undefined =>
  value === undefined ? undefined : Number(value);

export function parseCliArgs(argv: string[]): CliArgs {
  const { values } = parseArgs({
    args: argv,
    options: {
      detections: { type: 'string' },
      frames: { type: 'string' },
      fps: { type: 'string' },
      config: { type: 'string' },
      'output-dir': { type: 'string' },
      'detection-line': { type: 'string' },
      'line-axis': { type: 'string' },
      'lane-width': { type: 'string' },
      'reference-pixels': { type: 'string' },
      'reference-meters': { type: 'string' },
      'meters-per-pixel': { type: 'string' },
      'min-area': { type: 'string' },
      'match-threshold': { type: 'string' },
      'match-policy': { type: 'string' },
      'max-disappeared': { type: 'string' },
      'smoothing-window': { type: 'string' },
      'frame-width': { type: 'string' },
      'frame-height': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  let calibration: ConfigInput['calibration'];
  if (values['meters-per-pixel'] !== undefined) {
    calibration = { mode: 'scale', metersPerPixel: Number(values['meters-per-pixel']) };
  } else if (values['reference-pixels'] !== undefined || values['reference-meters'] !== undefined) {
    calibration = {
      mode: 'reference',
      referenceSpanPixels: Number(values['reference-pixels']),
      referenceSpanMeters: Number(values['reference-meters']),
    };
  } else if (values['lane-width'] !== undefined) {
    calibration = { mode: 'lane', laneWidthMeters: Number(values['lane-width']) };
  }

  const overrides: Record<string, unknown> = {
    outputDir: values['output-dir'],
    minVehicleArea: toNumber(values['min-area']),
    matchThreshold: toNumber(values['match-threshold']),
    matchPolicy: values['match-policy'],
    maxDisappearedFrames: toNumber(values['max-disappeared']),
    speedSmoothingWindow: toNumber(values['smoothing-window']),
    frameWidth: toNumber(values['frame-width']),
    frameHeight: toNumber(values['frame-height']),
    calibration,
  };
  if (values['detection-line'] !== undefined || values['line-axis'] !== undefined) {
    overrides.detectionLine = {
      relativePosition: toNumber(values['detection-line']),
      axis: values['line-axis'],
    };
  }

  let source: FrameSourceArg | null = null;
  if (values.detections !== undefined) {
    source = { kind: 'detections', path: values.detections };
  } else if (values.frames !== undefined) {
    source = { kind: 'frames', dir: values.frames, fps: toNumber(values.fps) ?? 30 };
  }

  return {
    help: values.help ?? false,
    source,
    configPath: values.config,
    overrides: stripUndefined(overrides),
  };
}

// Leave unset flags out so they don't shadow the config file
function stripUndefined(record: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue;
    out[key] =
      typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined))
        : value;
  }
  return out;
}

function printSummary({ summary, files }: SessionResult): void {
  console.log(`Vehicles counted: ${summary.uniqueCount}`);
  console.log(`Tracks: ${summary.trackCount}, frames: ${summary.framesProcessed}, duration: ${summary.duration.toFixed(2)}s`);
  console.log(`Average speed: ${formatSpeed(summary.speed.avgKmh)}`);
  for (const file of Object.values(files)) console.log(`  ${file}`);
}

// Ctrl+C ends the frame loop; the session still writes its final export
async function runUntilInterrupted(
  frames: Iterable<FrameInput> | AsyncIterable<FrameInput>,
  config: PipelineConfig
): Promise<SessionResult> {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.info('[CLI] Interrupted, saving the session');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  try {
    return await runSession(frames, config, { signal: controller.signal });
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

export async function main(argv: string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(`[CLI] ${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
    return 1;
  }
  if (args.help) {
    console.log(USAGE);
    return 0;
  }
  if (!args.source) {
    console.error(`[CLI] One of --detections or --frames is required\n\n${USAGE}`);
    return 1;
  }

  try {
    if (args.source.kind === 'detections') {
      const file = await loadDetectionsFile(args.source.path);
      let overrides = args.overrides;
      if (file.frameSize && overrides.frameWidth === undefined && overrides.frameHeight === undefined) {
        overrides = { ...overrides, frameWidth: file.frameSize.width, frameHeight: file.frameSize.height };
      }
      const config = await loadConfig(args.configPath, overrides);
      printSummary(await runUntilInterrupted(file.frames, config));
      return 0;
    }

    const config = await loadConfig(args.configPath, args.overrides);
    const detector = new GeminiVehicleDetector({
      frameSize: { width: config.frameWidth, height: config.frameHeight },
      minVehicleArea: config.minVehicleArea,
      apiKey: process.env.GEMINI_API_KEY ?? process.env.API_KEY,
    });
    const images = await listFrameImages(args.source.dir);
    printSummary(await runUntilInterrupted(detectFrames(images, detector, args.source.fps), config));
    return 0;
  } catch (error) {
    if (error instanceof TrafficTrackerError) {
      console.error(`[CLI] ${error.message}`);
      return 1;
    }
    throw error;
  }
}

const isDirectRun = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isDirectRun) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('[CLI] Unexpected failure:', error);
      process.exitCode = 1;
    }
  );
}
