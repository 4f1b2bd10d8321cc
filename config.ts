import fs from 'fs/promises';
import { z } from 'zod';
import { DEFAULT_LANE_WIDTH_METERS } from './utils/calibration';
import { ConfigurationError } from './utils/errors';

// Calibration spans are only type-checked here. The calibrator rejects
// non-positive values itself so that failure surfaces as InvalidCalibrationError.
const calibrationSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('reference'),
    referenceSpanPixels: z.number(),
    referenceSpanMeters: z.number(),
  }),
  z.object({
    mode: z.literal('lane'),
    laneWidthMeters: z.number().default(DEFAULT_LANE_WIDTH_METERS),
    laneSpanPixels: z.number().optional(),
    laneFraction: z.number().optional(),
  }),
  z.object({
    mode: z.literal('scale'),
    metersPerPixel: z.number(),
  }),
]);

export const configSchema = z.object({
  matchThreshold: z.number().min(0).max(1).default(0.3),
  matchPolicy: z.enum(['iou', 'overlap-min']).default('iou'),
  maxDisappearedFrames: z.number().int().positive().default(10),
  detectionLine: z
    .object({
      relativePosition: z.number().gt(0).lt(1).default(0.6),
      axis: z.enum(['y', 'x']).default('y'),
    })
    .default({}),
  calibration: calibrationSchema.default({ mode: 'lane', laneWidthMeters: DEFAULT_LANE_WIDTH_METERS }),
  speedSmoothingWindow: z.number().int().positive().default(5),
  // Applied by the detector: smaller boxes never reach the tracker
  minVehicleArea: z.number().nonnegative().default(500),
  frameWidth: z.number().int().positive().default(1280),
  frameHeight: z.number().int().positive().default(720),
  outputDir: z.string().min(1).default('data'),
  saveIntervalSeconds: z.number().positive().default(10),
  speedBucketWidthKmh: z.number().positive().default(5),
});

export type PipelineConfig = Readonly<z.infer<typeof configSchema>>;
export type ConfigInput = z.input<typeof configSchema>;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Later sources win. detectionLine merges key by key, everything else is replaced whole.
const mergeSources = (...sources: unknown[]): Record<string, unknown> => {
  const merged: Record<string, unknown> = {};
  for (const source of sources) {
    if (!isRecord(source)) continue;
    for (const [key, value] of Object.entries(source)) {
      if (value === undefined) continue;
      const previous = merged[key];
      merged[key] =
        key === 'detectionLine' && isRecord(previous) && isRecord(value) ? { ...previous, ...value } : value;
    }
  }
  return merged;
};

const deepFreeze = <T>(value: T): T => {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
};

export function parseConfig(...sources: unknown[]): PipelineConfig {
  const result = configSchema.safeParse(mergeSources(...sources));
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return deepFreeze(result.data);
}

export async function loadConfig(
  configPath?: string,
  overrides: Record<string, unknown> = {},
): Promise<PipelineConfig> {
  if (!configPath) return parseConfig(overrides);

  let fileConfig: unknown;
  try {
    fileConfig = JSON.parse(await fs.readFile(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read config file ${configPath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (!isRecord(fileConfig)) {
    throw new ConfigurationError(`Config file ${configPath} must contain a JSON object`);
  }
  return parseConfig(fileConfig, overrides);
}
