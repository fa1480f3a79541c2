/**
 * Batch inference over a directory of images
 *
 * discoverImages() -> runBatch() -> BatchReport
 *
 * Each task runs (letterbox ->) inference inside the busy-retry policy and
 * always yields exactly one TaskOutcome; a failing image never stops the batch.
 */
import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { buildReport } from './aggregate';
import type { InferenceClient } from './client';
import { errorMessage, InvalidInputError } from './errors';
import { WorkerPool } from './pool';
import { DEFAULT_TENSOR_SIZE, letterbox, type Size, toJpegPayload } from './preprocess';
import { withBusyRetry } from './retry';
import type { BatchReport, Detection, ImageTask, InferenceMode, TaskOutcome } from './types';

// ============================================
// Types
// ============================================

/** The part of the client a worker needs */
export type DetectionService = Pick<InferenceClient, 'inferJpeg' | 'inferTensor'>;

export type TaskOptions = {
  mode?: InferenceMode;
  /** Tensor mode canvas, normally the model input size (default: 640x640) */
  tensorSize?: Size;
  maxRetries?: number;
  baseDelayMs?: number;
  /** Drop detections below this confidence */
  minConfidence?: number;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (task: ImageTask, info: { attempt: number; delayMs: number; error: Error }) => void;
};

export type BatchProgress = {
  completed: number;
  successful: number;
  total: number;
  outcome: TaskOutcome;
};

export type BatchOptions = TaskOptions & {
  /** Parallel workers; match the service queue depth (default: 3) */
  numWorkers?: number;
  debug?: boolean;
  onProgress?: (progress: BatchProgress) => void;
};

export const DEFAULT_IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png'];
export const DEFAULT_NUM_WORKERS = 3;

// ============================================
// Discovery
// ============================================

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Enumerate images by extension (case-insensitive), sorted by file name.
 * A file path yields a single task.
 */
export async function discoverImages(
  target: string,
  extensions: readonly string[] = DEFAULT_IMAGE_EXTENSIONS
): Promise<ImageTask[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(target);
  } catch (error) {
    throw new InvalidInputError(`Path not found: ${target}`, { cause: error });
  }

  if (stat.isFile()) {
    return [{ index: 0, source_path: target }];
  }

  const wanted = new Set(extensions.map(normalizeExtension));
  const entries = await fs.readdir(target, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name, index) => ({ index, source_path: path.join(target, name) }));
}

// ============================================
// Single task
// ============================================

export function filterByConfidence(detections: Detection[], minConfidence = 0): Detection[] {
  if (minConfidence <= 0) return detections;
  return detections.filter((d) => d.confidence >= minConfidence);
}

/**
 * Run one task to completion. Never throws: every failure is recorded in
 * the returned outcome.
 */
export async function processImage(
  service: DetectionService,
  task: ImageTask,
  options: TaskOptions = {}
): Promise<TaskOutcome> {
  const sourceName = path.basename(task.source_path);
  const taskStart = Date.now();

  const failure = (error: unknown, attempts: number): TaskOutcome => ({
    index: task.index,
    source_name: sourceName,
    success: false,
    error: errorMessage(error),
    attempts,
    elapsed: (Date.now() - taskStart) / 1000,
  });

  // Local preparation happens once; only the network call is retried
  let infer: () => Promise<Detection[]>;
  try {
    if (options.mode === 'tensor') {
      const tensor = await letterbox(task.source_path, options.tensorSize ?? DEFAULT_TENSOR_SIZE);
      infer = () => service.inferTensor(tensor, task.index);
    } else {
      const payload = await toJpegPayload(task.source_path);
      infer = () => service.inferJpeg(payload, task.index);
    }
  } catch (error) {
    return failure(error, 0);
  }

  const { onRetry } = options;
  const result = await withBusyRetry(
    async () => {
      const start = Date.now();
      const detections = await infer();
      return { detections, elapsed: (Date.now() - start) / 1000 };
    },
    {
      maxRetries: options.maxRetries,
      baseDelayMs: options.baseDelayMs,
      signal: options.signal,
      sleep: options.sleep,
      onRetry: onRetry ? (info) => onRetry(task, info) : undefined,
    }
  );

  if (!result.ok) {
    return failure(result.error, result.attempts);
  }

  return {
    index: task.index,
    source_name: sourceName,
    success: true,
    detections: filterByConfidence(result.value.detections, options.minConfidence),
    attempts: result.attempts,
    elapsed: result.value.elapsed,
  };
}

// ============================================
// Batch
// ============================================

function assertUniqueIndices(tasks: readonly ImageTask[]) {
  const seen = new Set<number>();
  for (const task of tasks) {
    if (seen.has(task.index)) {
      throw new InvalidInputError(`Duplicate task index ${task.index} (${task.source_path})`);
    }
    seen.add(task.index);
  }
}

export async function runBatch(
  service: DetectionService,
  tasks: readonly ImageTask[],
  options: BatchOptions = {}
): Promise<BatchReport> {
  assertUniqueIndices(tasks);

  const pool = new WorkerPool({
    concurrency: options.numWorkers ?? DEFAULT_NUM_WORKERS,
    signal: options.signal,
    debug: options.debug,
  });

  const startTime = Date.now();
  let completed = 0;
  let successful = 0;

  const { results, skipped } = await pool.run(
    tasks,
    (task) => processImage(service, task, options),
    (outcome) => {
      completed++;
      if (outcome.success) successful++;
      options.onProgress?.({ completed, successful, total: tasks.length, outcome });
    }
  );

  const cancelled: TaskOutcome[] = skipped.map((task) => ({
    index: task.index,
    source_name: path.basename(task.source_path),
    success: false,
    error: 'Cancelled',
    attempts: 0,
    elapsed: 0,
  }));

  const totalTime = (Date.now() - startTime) / 1000;
  return buildReport([...results, ...cancelled], totalTime);
}

export async function writeReport(report: BatchReport, outputPath: string): Promise<void> {
  await fs.mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
  await fs.writeFile(outputPath, JSON.stringify(report, null, 2));
}
