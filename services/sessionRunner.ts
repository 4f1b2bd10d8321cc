import type { PipelineConfig } from '../config';
import type { SessionSummary } from '../types';
import type { FrameInput } from './frameSource';
import { SessionStorage, type SavedFiles } from './storage';
import { TrafficPipeline, type FrameResult } from './trafficPipeline';

export interface SessionDependencies {
  storage?: SessionStorage;
  clock?: () => number; // wall time in seconds
  onFrame?: (result: FrameResult) => void;
  signal?: AbortSignal; // stops after the current frame; the final export still runs
}

export interface SessionResult {
  summary: SessionSummary;
  files: SavedFiles;
  exports: number;
  interrupted: boolean;
}

const wallClockSeconds = (): number => Date.now() / 1000;

/**
 * Feeds frames through the pipeline strictly in order. Storage is flushed
 * whenever `saveIntervalSeconds` of wall time have passed, and once at the end.
 * A run that fails part way still writes what it collected before rethrowing.
 */
export async function runSession(
  frames: Iterable<FrameInput> | AsyncIterable<FrameInput>,
  config: PipelineConfig,
  deps: SessionDependencies = {}
): Promise<SessionResult> {
  const clock = deps.clock ?? wallClockSeconds;
  const storage = deps.storage ?? new SessionStorage({ outputDir: config.outputDir });
  const pipeline = new TrafficPipeline(config, { sink: storage, clock });

  let lastSave = clock();
  let exports = 0;

  let interrupted = false;

  try {
    for await (const frame of frames) {
      if (deps.signal?.aborted) {
        interrupted = true;
        break;
      }
      const result = pipeline.processFrame(frame.boxes, frame.frameIndex, frame.timestamp);
      deps.onFrame?.(result);

      if (clock() - lastSave >= config.saveIntervalSeconds) {
        await storage.flush(pipeline.getSnapshot());
        exports++;
        lastSave = clock();
      }
    }
  } catch (error) {
    const processed = pipeline.getSessionSummary().framesProcessed;
    console.error(`[Session] Stopped after ${processed} frames, saving partial results`);
    try {
      await storage.flush(pipeline.getSnapshot());
    } catch (flushError) {
      console.error('[Session] Could not save partial results:', flushError);
    }
    throw error;
  }

  if (interrupted) {
    console.info(`[Session] Interrupted after ${pipeline.getSessionSummary().framesProcessed} frames`);
  }
  const files = await storage.flush(pipeline.getSnapshot());
  exports++;
  return { summary: pipeline.getSessionSummary(), files, exports, interrupted };
}
