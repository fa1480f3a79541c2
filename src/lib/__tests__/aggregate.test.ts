import { describe, expect, it } from 'vitest';
import { buildReport, countLabels } from '../aggregate';
import type { Detection, TaskOutcome } from '../types';

function det(label: string): Detection {
  return {
    index: 0,
    label,
    class_id: 0,
    confidence: 0.8,
    bbox_pixels: { x: 0, y: 0, w: 1, h: 1 },
    bbox_yolo: { cx: 0.5, cy: 0.5, w: 0.1, h: 0.1 },
  };
}

function ok(index: number, elapsed: number, labels: string[]): TaskOutcome {
  return {
    index,
    source_name: `img${index}.jpg`,
    success: true,
    detections: labels.map(det),
    attempts: 1,
    elapsed,
  };
}

function failed(index: number, error: string): TaskOutcome {
  return { index, source_name: `img${index}.jpg`, success: false, error, attempts: 3, elapsed: 2 };
}

describe('countLabels', () => {
  it('counts detections per label', () => {
    expect(countLabels([det('person'), det('car'), det('person')])).toEqual({ person: 2, car: 1 });
  });
});

describe('buildReport', () => {
  it('sorts results by index and aggregates successful outcomes only', () => {
    const report = buildReport(
      [ok(2, 0.5, ['car']), failed(1, 'Max retries exceeded'), ok(0, 1.5, ['person', 'person'])],
      4
    );

    expect(report.results.map((r) => r.index)).toEqual([0, 1, 2]);
    expect(report.statistics).toEqual({
      total: 3,
      successful: 2,
      failed: 1,
      total_detections: 3,
      total_time: 4,
      avg_inference_time: 1,
      throughput_images_per_sec: 0.75,
      class_counts: { person: 2, car: 1 },
    });
  });

  it('reports zero averages when nothing succeeded', () => {
    const report = buildReport([failed(0, 'boom')], 0);
    expect(report.statistics.avg_inference_time).toBe(0);
    expect(report.statistics.throughput_images_per_sec).toBe(0);
    expect(report.statistics.class_counts).toEqual({});
  });

  it('handles an empty batch', () => {
    expect(buildReport([], 0)).toEqual({
      statistics: {
        total: 0,
        successful: 0,
        failed: 0,
        total_detections: 0,
        total_time: 0,
        avg_inference_time: 0,
        throughput_images_per_sec: 0,
        class_counts: {},
      },
      results: [],
    });
  });

  it('does not reorder the input array', () => {
    const outcomes = [ok(1, 1, []), ok(0, 1, [])];
    buildReport(outcomes, 1);
    expect(outcomes.map((o) => o.index)).toEqual([1, 0]);
  });
});
