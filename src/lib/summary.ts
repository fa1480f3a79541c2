import type { BatchReport, Detection } from './types';

export function formatDetection(det: Detection): string {
  const { x, y, w, h } = det.bbox_pixels;
  return `${det.label}: ${(det.confidence * 100).toFixed(1)}% at (${x}, ${y}) ${w}x${h}`;
}

/** Most frequent first, ties by label */
export function sortCounts(counts: Record<string, number>): Array<[string, number]> {
  return Object.entries(counts).sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}

export function formatSummary(report: BatchReport, maxFailures = 10): string[] {
  const stats = report.statistics;
  const lines = [
    '=== Batch Inference Summary ===',
    `Total images: ${stats.total}`,
    `Successful: ${stats.successful}`,
    `Failed: ${stats.failed}`,
    `Total detections: ${stats.total_detections}`,
    `Total time: ${stats.total_time.toFixed(2)}s`,
    `Average inference time: ${stats.avg_inference_time.toFixed(3)}s`,
    `Throughput: ${stats.throughput_images_per_sec.toFixed(2)} images/sec`,
  ];

  const classes = sortCounts(stats.class_counts);
  if (classes.length > 0) {
    lines.push('', 'Detections by class:');
    for (const [label, count] of classes) {
      lines.push(`  ${label}: ${count}`);
    }
  }

  const failed = report.results.filter((r) => !r.success);
  if (failed.length > 0) {
    lines.push('', `Failed images (${failed.length}):`);
    for (const result of failed.slice(0, maxFailures)) {
      lines.push(`  ${result.source_name}: ${result.error || 'Unknown error'}`);
    }
    if (failed.length > maxFailures) {
      lines.push(`  ... and ${failed.length - maxFailures} more`);
    }
  }

  return lines;
}
