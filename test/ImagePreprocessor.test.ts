import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { ImagePreprocessor } from '../src/lib/ImagePreprocessor.js';
import { PNG_SIGNATURE, makeBmp, makePng } from './helpers.js';

const WIDTH = 40;
const HEIGHT = 10;

/**
 * A single-channel image whose left half is `left` and right half `right`.
 */
function splitImage(left: number, right: number): Promise<Buffer> {
  const pixels = Buffer.alloc(WIDTH * HEIGHT);
  for (let y = 0; y < HEIGHT; y++) {
    for (let x = 0; x < WIDTH; x++) {
      pixels[y * WIDTH + x] = x < WIDTH / 2 ? left : right;
    }
  }
  return sharp(pixels, { raw: { width: WIDTH, height: HEIGHT, channels: 1 } }).png().toBuffer();
}

async function greyPixels(png: Buffer): Promise<Buffer> {
  return sharp(png).extractChannel(0).raw().toBuffer();
}

describe('ImagePreprocessor', () => {
  it('should produce a single-channel PNG of the same size', async () => {
    const preprocessor = new ImagePreprocessor();
    const output = await preprocessor.prepare(await makePng(WIDTH, HEIGHT));

    expect(output.subarray(0, 8)).toEqual(PNG_SIGNATURE);
    const metadata = await sharp(output).metadata();
    expect(metadata).toMatchObject({ format: 'png', width: WIDTH, height: HEIGHT, channels: 1 });
  });

  it('should stretch a low-contrast image to exactly 0..255', async () => {
    const preprocessor = new ImagePreprocessor();
    const output = await preprocessor.prepare(await splitImage(110, 140));

    const { channels } = await sharp(output).stats();
    expect(channels[0]?.min).toBe(0);
    expect(channels[0]?.max).toBe(255);

    const pixels = await greyPixels(output);
    // Far from the edge between the halves the blur has no effect.
    expect(pixels[0]).toBe(0);
    expect(pixels[WIDTH - 1]).toBe(255);
  });

  it.each([
    [1, 100, 140],
    [2, 80, 160],
    [3, 60, 180],
  ])('should push pixels away from the mean with factor %d', async (factor, dark, light) => {
    const preprocessor = new ImagePreprocessor({
      contrastFactor: factor,
      blurSigma: 0,
      autocontrast: false,
    });
    const pixels = await greyPixels(await preprocessor.prepare(await splitImage(100, 140)));

    expect(pixels[0]).toBe(dark);
    expect(pixels[WIDTH / 2 - 1]).toBe(dark);
    expect(pixels[WIDTH / 2]).toBe(light);
    expect(pixels[WIDTH - 1]).toBe(light);
    expect(new Set(pixels)).toEqual(new Set([dark, light]));
  });

  it('should stretch a ramp linearly from its darkest to its brightest pixel', async () => {
    const width = 50;
    const ramp = Buffer.from(Array.from({ length: width }, (_, x) => 100 + x));
    const png = await sharp(ramp, { raw: { width, height: 1, channels: 1 } }).png().toBuffer();
    const preprocessor = new ImagePreprocessor({ contrastFactor: 1, blurSigma: 0 });

    const pixels = await greyPixels(await preprocessor.prepare(png));

    const expected = Array.from({ length: width }, (_, x) => Math.round((x * 255) / 49));
    expect([...pixels]).toEqual(expected);
    expect(pixels[0]).toBe(0);
    expect(pixels[width - 1]).toBe(255);
  });

  it('should leave a flat image flat', async () => {
    const output = await new ImagePreprocessor().prepare(await makePng(WIDTH, HEIGHT));

    const { channels } = await sharp(output).stats();
    expect(channels[0]?.min).toBe(channels[0]?.max);
  });

  it('should keep colour channels when preprocessing is disabled', async () => {
    const preprocessor = new ImagePreprocessor({ enabled: false });
    const output = await preprocessor.prepare(await makePng(WIDTH, HEIGHT));

    const metadata = await sharp(output).metadata();
    expect(metadata).toMatchObject({ format: 'png', channels: 3 });
    expect(preprocessor.preprocessing).toBe(false);
  });

  it('should decode formats other than PNG', async () => {
    const jpeg = await sharp(await makePng(WIDTH, HEIGHT)).jpeg().toBuffer();
    const output = await new ImagePreprocessor().prepare(jpeg);

    const metadata = await sharp(output).metadata();
    expect(metadata.format).toBe('png');
  });

  it('should decode a 24-bit bitmap', async () => {
    const bmp = makeBmp(4, 2, (x, y) => (y === 0 ? [200, 10, 30] : [x * 10, 100, 250]));
    const output = await new ImagePreprocessor({ enabled: false }).prepare(bmp);

    const metadata = await sharp(output).metadata();
    expect(metadata).toMatchObject({ format: 'png', width: 4, height: 2, channels: 3 });
    const pixels = await sharp(output).raw().toBuffer();
    expect([...pixels]).toEqual([
      200, 10, 30, 200, 10, 30, 200, 10, 30, 200, 10, 30,
      0, 100, 250, 10, 100, 250, 20, 100, 250, 30, 100, 250,
    ]);
  });

  it('should preprocess a bitmap like any other image', async () => {
    const bmp = makeBmp(WIDTH, HEIGHT, (x) => (x < WIDTH / 2 ? [110, 110, 110] : [140, 140, 140]));
    const output = await new ImagePreprocessor().prepare(bmp);

    expect(output.subarray(0, 8)).toEqual(PNG_SIGNATURE);
    const pixels = await greyPixels(output);
    expect(pixels[0]).toBe(0);
    expect(pixels[WIDTH - 1]).toBe(255);
  });

  it('should reject a truncated bitmap', async () => {
    await expect(new ImagePreprocessor().prepare(Buffer.from('BM not really'))).rejects.toThrow();
  });

  it('should reject bytes that are not an image', async () => {
    await expect(new ImagePreprocessor().prepare(Buffer.from('plain text'))).rejects.toThrow();
  });
});
