import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { InvalidInputError } from '../errors';
import { computeLetterbox, isJpeg, letterbox, toJpegPayload } from '../preprocess';
import { solidImage } from './fake-transport';

describe('computeLetterbox', () => {
  it('fits a landscape image to the width and centers it vertically', () => {
    expect(computeLetterbox(1280, 720, 640, 640)).toEqual({
      scale: 0.5,
      width: 640,
      height: 360,
      left: 0,
      top: 140,
    });
  });

  it('upscales a small portrait image to the height', () => {
    expect(computeLetterbox(300, 500, 640, 640)).toEqual({
      scale: 1.28,
      width: 384,
      height: 640,
      left: 128,
      top: 0,
    });
  });

  it('fits a very wide image to the width', () => {
    const geometry = computeLetterbox(1000, 200, 640, 640);
    expect(geometry.scale).toBeLessThanOrEqual(1);
    expect(geometry.width).toBe(640);
    expect(geometry.height).toBe(128);
    expect(geometry.top).toBe(256);
  });

  it('keeps an image that already matches the target', () => {
    expect(computeLetterbox(640, 480, 640, 480)).toEqual({
      scale: 1,
      width: 640,
      height: 480,
      left: 0,
      top: 0,
    });
  });

  it('rejects empty dimensions', () => {
    expect(() => computeLetterbox(0, 10, 640, 640)).toThrow(InvalidInputError);
  });
});

describe('letterbox', () => {
  it('returns the same bytes for an image already at the target size', async () => {
    const width = 6;
    const height = 4;
    const raw = Buffer.alloc(width * height * 3);
    for (let i = 0; i < raw.length; i++) raw[i] = (i * 7) % 256;
    const png = await sharp(raw, { raw: { width, height, channels: 3 } }).png().toBuffer();

    const tensor = await letterbox(png, { width, height });

    expect(tensor.shape).toEqual([height, width, 3]);
    expect(Buffer.from(tensor.data).equals(raw)).toBe(true);
  });

  it('pads above and below a wide image with black', async () => {
    const png = await solidImage(20, 10).png().toBuffer();

    const tensor = await letterbox(png, { width: 8, height: 8 });

    expect(tensor.shape).toEqual([8, 8, 3]);
    expect(tensor.data.length).toBe(8 * 8 * 3);
    const pixel = (x: number, y: number) => Array.from(tensor.data.slice((y * 8 + x) * 3, (y * 8 + x) * 3 + 3));
    // 20x10 -> 8x4 placed at rows 2..5
    for (const y of [0, 1, 6, 7]) {
      for (let x = 0; x < 8; x++) expect(pixel(x, y)).toEqual([0, 0, 0]);
    }
    for (const y of [2, 3, 4, 5]) {
      for (let x = 0; x < 8; x++) {
        const [r, g, b] = pixel(x, y);
        expect(Math.abs(r - 200)).toBeLessThanOrEqual(1);
        expect(Math.abs(g - 100)).toBeLessThanOrEqual(1);
        expect(Math.abs(b - 50)).toBeLessThanOrEqual(1);
      }
    }
  });

  it('drops the alpha channel', async () => {
    const png = await sharp({
      create: { width: 4, height: 4, channels: 4, background: { r: 10, g: 20, b: 30, alpha: 0.5 } },
    })
      .png()
      .toBuffer();

    const tensor = await letterbox(png, { width: 4, height: 4 });

    expect(tensor.shape).toEqual([4, 4, 3]);
    expect(tensor.data.length).toBe(48);
  });

  it('fails with InvalidInputError on bytes that are not an image', async () => {
    await expect(letterbox(Buffer.from('not an image'))).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('toJpegPayload', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'detectx-preprocess-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('passes JPEG bytes through untouched', async () => {
    const jpeg = await solidImage(8, 8).jpeg().toBuffer();
    expect(await toJpegPayload(jpeg)).toBe(jpeg);
  });

  it('reads a JPEG file from disk', async () => {
    const jpeg = await solidImage(8, 8).jpeg().toBuffer();
    const file = path.join(dir, 'photo.jpg');
    await fs.writeFile(file, jpeg);
    expect((await toJpegPayload(file)).equals(jpeg)).toBe(true);
  });

  it('converts a PNG with alpha to an opaque RGB JPEG', async () => {
    const png = await sharp({
      create: { width: 8, height: 8, channels: 4, background: { r: 255, g: 0, b: 0, alpha: 0.25 } },
    })
      .png()
      .toBuffer();

    const payload = await toJpegPayload(png);
    const metadata = await sharp(payload).metadata();

    expect(isJpeg(payload)).toBe(true);
    expect(metadata.format).toBe('jpeg');
    expect(metadata.channels).toBe(3);
    expect(metadata.hasAlpha).toBe(false);
  });

  it('fails with InvalidInputError for a missing file', async () => {
    await expect(toJpegPayload(path.join(dir, 'missing.png'))).rejects.toBeInstanceOf(InvalidInputError);
  });
});
