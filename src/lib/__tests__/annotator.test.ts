import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { annotateDetections, buildSvg, escapeXml, getColor } from '../annotator';
import { InvalidInputError } from '../errors';
import { PERSON, solidImage } from './fake-transport';

describe('escapeXml', () => {
  it('escapes markup characters', () => {
    expect(escapeXml(`<a & "b" 'c'>`)).toBe('&lt;a &amp; &quot;b&quot; &apos;c&apos;&gt;');
  });
});

describe('getColor', () => {
  it('cycles through the palette by class id', () => {
    expect(getColor(0)).toBe('#e63946');
    expect(getColor(7)).toBe('#2ec4b6');
    expect(getColor(-1)).toBe('#2ec4b6');
  });
});

describe('buildSvg', () => {
  it('draws a box and a label per detection', () => {
    const svg = buildSvg(100, 80, [PERSON]);

    expect(svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="100" height="80"')).toBe(true);
    expect(svg).toContain(
      '<rect x="10" y="20" width="30" height="40" fill="none" stroke="#e63946" stroke-width="2" />'
    );
    expect(svg).toContain('>person 90%</text>');
  });

  it('tags each box in its class color and names unlabeled classes by id', () => {
    const svg = buildSvg(100, 80, [{ ...PERSON, label: ' ', class_id: 3, confidence: 0.456 }]);
    expect(svg).toContain('stroke="#f4a261"');
    expect(svg).toContain('fill="#f4a261" fill-opacity="0.85"');
    expect(svg).toContain('>class 3 46%</text>');
  });

  it('escapes labels', () => {
    expect(buildSvg(100, 80, [{ ...PERSON, label: 'a<b' }])).toContain('>a&lt;b 90%</text>');
  });

  it('clips boxes to the image', () => {
    const svg = buildSvg(100, 80, [{ ...PERSON, bbox_pixels: { x: 90, y: 70, w: 30, h: 40 } }]);
    expect(svg).toContain('<rect x="90" y="70" width="10" height="10" fill="none"');
  });
});

describe('annotateDetections', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'detectx-annotate-'));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('writes an image of the same size in the format of the extension', async () => {
    const image = await solidImage(120, 90).jpeg().toBuffer();
    const pngPath = path.join(dir, 'out.png');
    const jpgPath = path.join(dir, 'out.jpg');

    await annotateDetections({ image, detections: [PERSON], outputPath: pngPath });
    await annotateDetections({ image, detections: [], outputPath: jpgPath });

    const png = await sharp(pngPath).metadata();
    const jpg = await sharp(jpgPath).metadata();
    expect([png.format, png.width, png.height]).toEqual(['png', 120, 90]);
    expect([jpg.format, jpg.width, jpg.height]).toEqual(['jpeg', 120, 90]);
  });

  it('fails on unreadable input', async () => {
    await expect(
      annotateDetections({ image: Buffer.from('nope'), detections: [], outputPath: path.join(dir, 'x.png') })
    ).rejects.toBeInstanceOf(InvalidInputError);
  });
});
