import { Jimp } from 'jimp';
import sharp from 'sharp';

const DEFAULT_CONTRAST_FACTOR = 2.0;
const DEFAULT_BLUR_SIGMA = 1;

export interface ImagePreprocessorOptions {
  /** When false the image is only decoded and re-encoded. */
  enabled?: boolean;
  contrastFactor?: number;
  /** Gaussian blur sigma; 0 skips the blur. */
  blurSigma?: number;
  autocontrast?: boolean;
}

/**
 * True for a Windows bitmap ("BM" file header).
 */
function isBitmap(bytes: Buffer): boolean {
  return bytes.length > 2 && bytes[0] === 0x42 && bytes[1] === 0x4d;
}

/**
 * Decodes image bytes and prepares them for text recognition.
 *
 * sharp reorders chained operations into its own fixed pipeline, so every
 * step is materialised to a PNG buffer before the next one runs:
 * grayscale -> contrast -> blur -> autocontrast.
 */
export class ImagePreprocessor {
  private readonly enabled: boolean;
  private readonly contrastFactor: number;
  private readonly blurSigma: number;
  private readonly stretch: boolean;

  constructor(options: ImagePreprocessorOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.contrastFactor = options.contrastFactor ?? DEFAULT_CONTRAST_FACTOR;
    this.blurSigma = options.blurSigma ?? DEFAULT_BLUR_SIGMA;
    this.stretch = options.autocontrast ?? true;
  }

  get preprocessing(): boolean {
    return this.enabled;
  }

  /**
   * @param bytes Encoded image: BMP, or any format sharp can decode.
   * @returns A lossless PNG ready for OCR.
   */
  async prepare(bytes: Buffer): Promise<Buffer> {
    const decoded = await this.decode(bytes);
    if (!this.enabled) {
      return decoded;
    }

    // Transparent pixels become white paper rather than their hidden colour.
    const grey = await sharp(decoded)
      .flatten({ background: '#ffffff' })
      .greyscale()
      .toColourspace('b-w')
      .png()
      .toBuffer();

    const contrasted = await this.enhanceContrast(grey);

    const blurred =
      this.blurSigma > 0
        ? await sharp(contrasted).blur(this.blurSigma).toColourspace('b-w').png().toBuffer()
        : contrasted;

    return this.stretch ? this.autocontrast(blurred) : blurred;
  }

  /**
   * Re-encodes the input as PNG. libvips ships without a BMP loader, so
   * bitmaps go through jimp and reach sharp as raw RGB pixels.
   */
  private async decode(bytes: Buffer): Promise<Buffer> {
    if (!isBitmap(bytes)) {
      return sharp(bytes).png().toBuffer();
    }

    const { bitmap } = await Jimp.read(bytes);
    return sharp(bitmap.data, {
      raw: { width: bitmap.width, height: bitmap.height, channels: 4 },
    })
      .removeAlpha()
      .png()
      .toBuffer();
  }

  /**
   * Pushes every pixel away from the image mean: out = mean + f * (in - mean).
   */
  private async enhanceContrast(grey: Buffer): Promise<Buffer> {
    const { channels } = await sharp(grey).stats();
    const mean = Math.round(channels[0]?.mean ?? 0);
    const factor = this.contrastFactor;

    return sharp(grey)
      .linear(factor, mean * (1 - factor))
      .toColourspace('b-w')
      .png()
      .toBuffer();
  }

  /**
   * Linear stretch of the darkest pixel to 0 and the brightest to 255.
   * A flat image is returned as is.
   */
  private async autocontrast(grey: Buffer): Promise<Buffer> {
    const { data, info } = await sharp(grey)
      .extractChannel(0)
      .raw()
      .toBuffer({ resolveWithObject: true });

    let min = 255;
    let max = 0;
    for (const value of data) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
    if (max <= min) {
      return grey;
    }

    const lut = new Uint8Array(256);
    for (let value = min; value <= max; value++) {
      lut[value] = Math.round(((value - min) * 255) / (max - min));
    }
    const stretched = Buffer.alloc(data.length);
    for (let i = 0; i < data.length; i++) {
      stretched[i] = lut[data[i] ?? 0] ?? 0;
    }

    return sharp(stretched, { raw: { width: info.width, height: info.height, channels: 1 } })
      .png()
      .toBuffer();
  }
}
