/**
 * Image preparation for the two inference endpoints
 *
 * - letterbox(): the same aspect-preserving resize + black padding the
 *   service applies to JPEG input, so tensor-mode results match
 * - toJpegPayload(): passes JPEG bytes through, re-encodes anything else
 */
import fs from 'fs/promises';
import path from 'path';
import sharp from 'sharp';
import { InvalidInputError } from './errors';
import type { PixelTensor } from './types';

export type ImageInput = string | Buffer;

export type Size = {
  width: number;
  height: number;
};

export type LetterboxGeometry = {
  scale: number;
  /** Resized image size */
  width: number;
  height: number;
  /** Offset of the resized image on the canvas */
  left: number;
  top: number;
};

export const DEFAULT_TENSOR_SIZE: Size = { width: 640, height: 640 };
export const JPEG_QUALITY = 95;

const JPEG_MAGIC = [0xff, 0xd8, 0xff];

function describeInput(image: ImageInput): string {
  return typeof image === 'string' ? path.basename(image) : `<${image.length} byte buffer>`;
}

export function computeLetterbox(
  imageWidth: number,
  imageHeight: number,
  targetWidth: number,
  targetHeight: number
): LetterboxGeometry {
  if (imageWidth <= 0 || imageHeight <= 0 || targetWidth <= 0 || targetHeight <= 0) {
    throw new InvalidInputError(
      `Invalid letterbox dimensions: ${imageWidth}x${imageHeight} -> ${targetWidth}x${targetHeight}`
    );
  }
  const scale = Math.min(targetWidth / imageWidth, targetHeight / imageHeight);
  // never wider/taller than the canvas
  const width = Math.min(targetWidth, Math.max(1, Math.round(imageWidth * scale)));
  const height = Math.min(targetHeight, Math.max(1, Math.round(imageHeight * scale)));
  return {
    scale,
    width,
    height,
    left: Math.floor((targetWidth - width) / 2),
    top: Math.floor((targetHeight - height) / 2),
  };
}

export async function readImageSize(image: ImageInput): Promise<Size> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(image).metadata();
  } catch (error) {
    throw new InvalidInputError(`Unable to read image ${describeInput(image)}`, { cause: error });
  }
  if (!metadata.width || !metadata.height) {
    throw new InvalidInputError(`Unable to read image dimensions of ${describeInput(image)}`);
  }
  return { width: metadata.width, height: metadata.height };
}

/**
 * Letterbox an image into an RGB uint8 tensor of shape [height, width, 3].
 */
export async function letterbox(
  image: ImageInput,
  target: Size = DEFAULT_TENSOR_SIZE
): Promise<PixelTensor> {
  const source = await readImageSize(image);
  const geometry = computeLetterbox(source.width, source.height, target.width, target.height);

  let pipeline = sharp(image).removeAlpha().toColourspace('srgb');

  if (geometry.width !== source.width || geometry.height !== source.height) {
    pipeline = pipeline.resize(geometry.width, geometry.height, {
      fit: 'fill',
      kernel: 'linear',
    });
  }

  const right = target.width - geometry.width - geometry.left;
  const bottom = target.height - geometry.height - geometry.top;
  if (geometry.left > 0 || geometry.top > 0 || right > 0 || bottom > 0) {
    pipeline = pipeline.extend({
      top: geometry.top,
      bottom,
      left: geometry.left,
      right,
      background: { r: 0, g: 0, b: 0 },
    });
  }

  let output: { data: Buffer; info: sharp.OutputInfo };
  try {
    output = await pipeline.raw().toBuffer({ resolveWithObject: true });
  } catch (error) {
    throw new InvalidInputError(`Unable to preprocess ${describeInput(image)}`, { cause: error });
  }

  const { data, info } = output;
  if (info.channels !== 3 || info.width !== target.width || info.height !== target.height) {
    throw new InvalidInputError(
      `Preprocessing produced ${info.width}x${info.height}x${info.channels}, ` +
        `expected ${target.width}x${target.height}x3`
    );
  }

  return { shape: [target.height, target.width, 3], data };
}

export function isJpeg(bytes: Uint8Array): boolean {
  return bytes.length >= JPEG_MAGIC.length && JPEG_MAGIC.every((b, i) => bytes[i] === b);
}

/**
 * Bytes for the JPEG endpoint. Non-JPEG input is flattened to opaque RGB
 * (alpha dropped, palette expanded) and encoded at quality 95.
 */
export async function toJpegPayload(image: ImageInput): Promise<Buffer> {
  let bytes: Buffer;
  if (typeof image === 'string') {
    try {
      bytes = await fs.readFile(image);
    } catch (error) {
      throw new InvalidInputError(`Unable to read image ${describeInput(image)}`, { cause: error });
    }
  } else {
    bytes = image;
  }

  if (isJpeg(bytes)) return bytes;

  try {
    return await sharp(bytes)
      .removeAlpha()
      .toColourspace('srgb')
      .jpeg({ quality: JPEG_QUALITY })
      .toBuffer();
  } catch (error) {
    throw new InvalidInputError(`Unable to convert ${describeInput(image)} to JPEG`, { cause: error });
  }
}
