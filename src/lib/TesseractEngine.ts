import { createWorker, OEM, PSM, type Worker } from 'tesseract.js';
import type { Logger } from './logger.js';
import type { OcrEngine } from './types.js';

export interface TesseractEngineOptions {
  logger: Logger;
  /** Tesseract language code(s), joined with "+" (e.g. "eng+deu"). */
  language?: string;
  /** Directory or URL holding `<lang>.traineddata`. */
  langPath?: string;
  /** Where tesseract.js caches downloaded language data. */
  cachePath?: string;
  /**
   * Treat the image as a single uniform block of text. When false tesseract
   * segments the page automatically.
   */
  singleBlock?: boolean;
}

/**
 * OCR backed by a single tesseract.js worker, created lazily on first load.
 */
export class TesseractEngine implements OcrEngine {
  public readonly id = 'tesseract';
  private worker: Worker | null = null;
  private readonly logger: Logger;
  private readonly options: TesseractEngineOptions;

  constructor(options: TesseractEngineOptions) {
    this.options = options;
    this.logger = options.logger.child({ component: 'ocr' });
  }

  async load(): Promise<void> {
    if (this.worker) {
      return;
    }

    const language = this.options.language ?? 'eng';
    this.logger.debug({ language }, 'Starting tesseract worker');

    const worker = await createWorker(language, OEM.LSTM_ONLY, {
      // tesseract.js merges these over its defaults, so unset keys stay absent
      ...(this.options.langPath ? { langPath: this.options.langPath } : {}),
      ...(this.options.cachePath ? { cachePath: this.options.cachePath } : {}),
      logger: (message) => {
        this.logger.debug({ status: message.status, progress: message.progress }, 'OCR progress');
      },
    });

    try {
      await worker.setParameters({
        tessedit_pageseg_mode:
          this.options.singleBlock === false ? PSM.AUTO : PSM.SINGLE_BLOCK,
      });
    } catch (error) {
      await worker.terminate();
      throw error;
    }

    this.worker = worker;
  }

  async recognize(image: Buffer): Promise<string> {
    if (!this.worker) {
      throw new Error('Tesseract engine not loaded.');
    }

    const result = await this.worker.recognize(image);
    return result.data.text ?? '';
  }

  async destroy(): Promise<void> {
    if (this.worker) {
      const worker = this.worker;
      this.worker = null;
      await worker.terminate();
    }
  }
}
