import path from 'path';
import sharp from 'sharp';
import { InvalidInputError } from './errors';
import type { ImageInput, Size } from './preprocess';
import type { BBoxPixels, Detection } from './types';

const COLORS = ['#e63946', '#2ec4b6', '#457b9d', '#f4a261', '#9b5de5', '#ffc300'];
const FONT = 'system-ui, -apple-system, Segoe UI, sans-serif';

type OverlayStyle = {
  strokeWidth: number;
  fontSize: number;
};

export function escapeXml(text: string) {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Stable color per class id */
export function getColor(classId: number) {
  return COLORS[Math.abs(classId) % COLORS.length];
}

/** Box clipped to the image; the service may report boxes past the edge */
function clipBox(box: BBoxPixels, canvas: Size): BBoxPixels {
  const x = Math.min(canvas.width, Math.max(0, box.x));
  const y = Math.min(canvas.height, Math.max(0, box.y));
  return {
    x,
    y,
    w: Math.min(canvas.width - x, Math.max(0, box.w)),
    h: Math.min(canvas.height - y, Math.max(0, box.h)),
  };
}

function styleFor(canvas: Size): OverlayStyle {
  const shortSide = Math.min(canvas.width, canvas.height);
  return {
    strokeWidth: Math.max(2, Math.round(shortSide / 400)),
    fontSize: Math.max(12, Math.round(shortSide / 70)),
  };
}

function detectionElements(det: Detection, canvas: Size, style: OverlayStyle): string {
  const box = clipBox(det.bbox_pixels, canvas);
  const color = getColor(det.class_id);
  const text = escapeXml(`${det.label.trim() || `class ${det.class_id}`} ${Math.round(det.confidence * 100)}%`);

  // Tag sits above the box, or inside its top edge when there is no room
  const tagWidth = text.length * style.fontSize * 0.6 + 8;
  const tagHeight = style.fontSize + 8;
  const above = box.y - tagHeight - 2;
  const tagX = Math.min(box.x, Math.max(0, canvas.width - tagWidth));
  const tagY = Math.min(above >= 0 ? above : box.y + 2, Math.max(0, canvas.height - tagHeight));

  return [
    `<rect x="${box.x}" y="${box.y}" width="${box.w}" height="${box.h}" fill="none" stroke="${color}" stroke-width="${style.strokeWidth}" />`,
    `<rect x="${tagX.toFixed(1)}" y="${tagY.toFixed(1)}" width="${tagWidth.toFixed(1)}" height="${tagHeight}" fill="${color}" fill-opacity="0.85" />`,
    `<text x="${(tagX + 4).toFixed(1)}" y="${(tagY + 4).toFixed(1)}" font-size="${style.fontSize}" font-family="${FONT}" fill="#ffffff" dominant-baseline="hanging">${text}</text>`,
  ].join('\n');
}

export function buildSvg(width: number, height: number, detections: readonly Detection[]) {
  const canvas = { width, height };
  const style = styleFor(canvas);
  const body = detections.map((det) => detectionElements(det, canvas, style)).join('\n');
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">\n${body}\n</svg>`;
}

function encodeFor(outputPath: string, pipeline: sharp.Sharp): sharp.Sharp {
  switch (path.extname(outputPath).toLowerCase()) {
    case '.jpg':
    case '.jpeg':
      return pipeline.jpeg();
    case '.webp':
      return pipeline.webp();
    default:
      return pipeline.png();
  }
}

/**
 * Draw detection boxes (image-space pixels) onto the source image.
 */
export async function annotateDetections(options: {
  image: ImageInput;
  detections: readonly Detection[];
  outputPath: string;
}) {
  let pipeline = sharp(options.image);
  let metadata: sharp.Metadata;
  try {
    metadata = await pipeline.metadata();
  } catch (error) {
    throw new InvalidInputError('Unable to read image for annotation', { cause: error });
  }
  if (!metadata.width || !metadata.height) {
    throw new InvalidInputError('Unable to read image dimensions for annotation');
  }

  if (options.detections.length > 0) {
    const svg = buildSvg(metadata.width, metadata.height, options.detections);
    pipeline = pipeline.composite([{ input: Buffer.from(svg), top: 0, left: 0 }]);
  }

  await encodeFor(options.outputPath, pipeline).toFile(options.outputPath);
}
