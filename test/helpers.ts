import sharp from 'sharp';
import { type LogLevel, type Logger, createLogger } from '../src/lib/logger.js';
import type { OcrEngine } from '../src/lib/types.js';

export interface LogRecord {
  level: number;
  msg: string;
  component?: string;
  [key: string]: unknown;
}

/**
 * Builds a real pino logger whose lines are parsed into `records`.
 */
export function captureLogger(level: LogLevel = 'debug'): {
  logger: Logger;
  records: LogRecord[];
} {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level,
    destination: {
      write(line: string) {
        const record: LogRecord = JSON.parse(line);
        records.push(record);
      },
    },
  });
  return { logger, records };
}

/**
 * An OCR engine that returns canned text (or fails with a canned error).
 */
export class StubEngine implements OcrEngine {
  public readonly id = 'stub';
  public loads = 0;
  public destroyed = 0;
  public readonly images: Buffer[] = [];

  constructor(private readonly result: string | Error) {}

  async load(): Promise<void> {
    this.loads++;
  }

  async recognize(image: Buffer): Promise<string> {
    this.images.push(image);
    if (this.result instanceof Error) {
      throw this.result;
    }
    return this.result;
  }

  async destroy(): Promise<void> {
    this.destroyed++;
  }
}

/**
 * Collects everything written to it, for console-mode assertions.
 */
export class MemoryOutput {
  public readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }
}

/**
 * A plain RGB PNG of the given size.
 */
export function makePng(width = 32, height = 16): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 240, g: 240, b: 240 },
    },
  })
    .png()
    .toBuffer();
}

export const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/**
 * An uncompressed 24-bit Windows bitmap, `colour(x, y)` giving each pixel's
 * RGB value (y counts from the top).
 */
export function makeBmp(
  width: number,
  height: number,
  colour: (x: number, y: number) => [number, number, number]
): Buffer {
  const rowSize = Math.ceil((width * 3) / 4) * 4;
  const pixelBytes = rowSize * height;
  const bmp = Buffer.alloc(54 + pixelBytes);

  bmp.write('BM', 0, 'latin1');
  bmp.writeUInt32LE(bmp.length, 2);
  bmp.writeUInt32LE(54, 10);
  bmp.writeUInt32LE(40, 14);
  bmp.writeInt32LE(width, 18);
  bmp.writeInt32LE(height, 22);
  bmp.writeUInt16LE(1, 26);
  bmp.writeUInt16LE(24, 28);
  bmp.writeUInt32LE(0, 30);
  bmp.writeUInt32LE(pixelBytes, 34);
  bmp.writeInt32LE(2835, 38);
  bmp.writeInt32LE(2835, 42);

  // Rows are stored bottom-up, pixels as BGR.
  for (let y = 0; y < height; y++) {
    const row = 54 + (height - 1 - y) * rowSize;
    for (let x = 0; x < width; x++) {
      const [r, g, b] = colour(x, y);
      bmp[row + x * 3] = b;
      bmp[row + x * 3 + 1] = g;
      bmp[row + x * 3 + 2] = r;
    }
  }
  return bmp;
}
