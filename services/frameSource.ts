import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { BoundingBox, FrameSize } from '../types';
import { ConfigurationError } from '../utils/errors';
import type { VehicleDetector } from './geminiService';

export interface FrameInput {
  frameIndex: number;
  timestamp: number; // seconds
  boxes: BoundingBox[];
}

export interface DetectionsFile {
  fps: number;
  frameSize?: FrameSize;
  frames: FrameInput[];
}

const boxSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

const detectionsFileSchema = z.object({
  fps: z.number().positive(),
  frameWidth: z.number().int().positive().optional(),
  frameHeight: z.number().int().positive().optional(),
  frames: z
    .array(
      z.object({
        frameIndex: z.number().int().nonnegative(),
        timestamp: z.number().nonnegative().optional(),
        boxes: z.array(boxSchema),
      })
    )
    .superRefine((frames, ctx) => {
      const seen = new Set<number>();
      frames.forEach((frame, i) => {
        if (seen.has(frame.frameIndex)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [i, 'frameIndex'],
            message: `Frame index ${frame.frameIndex} appears more than once`,
          });
        }
        seen.add(frame.frameIndex);
      });
    }),
});

/**
 * Parse a detections file: `{ fps, frameWidth?, frameHeight?, frames: [{ frameIndex,
 * timestamp?, boxes: [[x, y, w, h], ...] }] }`. A frame without a timestamp is
 * placed at `frameIndex / fps`. Frames come back sorted by index; a repeated
 * index is rejected here rather than part way through a run.
 */
export function parseDetectionsFile(raw: unknown): DetectionsFile {
  const result = detectionsFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid detections file',
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const { fps, frameWidth, frameHeight, frames } = result.data;
  return {
    fps,
    frameSize: frameWidth && frameHeight ? { width: frameWidth, height: frameHeight } : undefined,
    frames: frames
      .map((frame) => ({
        frameIndex: frame.frameIndex,
        timestamp: frame.timestamp ?? frame.frameIndex / fps,
        boxes: frame.boxes.map(([x, y, width, height]) => ({ x, y, width, height })),
      }))
      .sort((a, b) => a.frameIndex - b.frameIndex),
  };
}

export async function loadDetectionsFile(filePath: string): Promise<DetectionsFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(
      `Could not read detections file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseDetectionsFile(raw);
}

export async function listFrameImages(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir);
  return entries
    .filter((name) => /\.jpe?g$/i.test(name))
    .sort((a, b) => a.localeCompare(b, undefined, { numeric: true }))
    .map((name) => path.join(dir, name));
}

/**
 * Runs the detector over each JPEG of a frame directory, one frame at a time.
 */
export async function* detectFrames(
  imagePaths: readonly string[],
  detector: VehicleDetector,
  fps: number
): AsyncGenerator<FrameInput> {
  for (const [frameIndex, imagePath] of imagePaths.entries()) {
    const base64 = (await fs.readFile(imagePath)).toString('base64');
    const boxes = await detector.detect(base64);
    yield { frameIndex, timestamp: frameIndex / fps, boxes };
  }
}
