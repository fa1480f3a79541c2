import type { BatchReport, BatchStatistics, Detection, TaskOutcome } from './types';

export function countLabels(detections: readonly Detection[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const det of detections) {
    counts[det.label] = (counts[det.label] || 0) + 1;
  }
  return counts;
}

/**
 * Reduce per-image outcomes into batch statistics.
 * `totalTimeSeconds` is the wall-clock time of the whole batch.
 */
export function buildReport(outcomes: readonly TaskOutcome[], totalTimeSeconds: number): BatchReport {
  const results = [...outcomes].sort((a, b) => a.index - b.index);

  const successful = results.filter((r) => r.success);
  const failed = results.length - successful.length;

  let totalDetections = 0;
  let inferenceTime = 0;
  const classCounts: Record<string, number> = {};

  for (const outcome of successful) {
    const detections = outcome.detections ?? [];
    totalDetections += detections.length;
    inferenceTime += outcome.elapsed;
    for (const det of detections) {
      classCounts[det.label] = (classCounts[det.label] || 0) + 1;
    }
  }

  const statistics: BatchStatistics = {
    total: results.length,
    successful: successful.length,
    failed,
    total_detections: totalDetections,
    total_time: totalTimeSeconds,
    avg_inference_time: successful.length > 0 ? inferenceTime / successful.length : 0,
    throughput_images_per_sec: totalTimeSeconds > 0 ? results.length / totalTimeSeconds : 0,
    class_counts: classCounts,
  };

  return { statistics, results };
}
