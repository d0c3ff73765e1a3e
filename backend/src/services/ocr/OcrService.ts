import Tesseract from 'tesseract.js';
import type { OcrPage, OcrResult, OcrSettings } from '@docshelf/shared/schemas/ocr.zod';
import { logger } from '../../utils/logger';

const DEFAULT_WORKER_COUNT = 2;
const TESSERACT_OEM = 1;
const CONFIDENCE_SCALE = 100;
const MAX_PAGES = 100;
const FIRST_PAGE_NUMBER = 1;
const OCR_RECOGNIZE_JOB = 'recognize';
const OCR_STATUS_RECOGNIZING = 'recognizing text';
const ALL_PAGES = 0;

interface WorkerProfile {
  language: string;
  imageDpi: number | null;
}

function sameProfile(a: WorkerProfile, b: WorkerProfile): boolean {
  return a.language === b.language && a.imageDpi === b.imageDpi;
}

function createOcrLogger() {
  return (m: Tesseract.LoggerMessage) => {
    if (m.status === OCR_STATUS_RECOGNIZING) {
      logger.debug(`OCR Progress: ${Math.round(m.progress * 100)}%`);
    }
  };
}

/**
 * Limits the pages handed to the engine according to OCR_PAGES; zero means
 * every page.
 */
export function selectPages(imageBuffers: Buffer[], settings: OcrSettings): Buffer[] {
  if (settings.pages === null || settings.pages === ALL_PAGES) {
    return imageBuffers;
  }
  return imageBuffers.slice(0, settings.pages);
}

export class OcrService {
  private scheduler: Tesseract.Scheduler | null = null;
  private profile: WorkerProfile | null = null;
  private pending: Promise<void> | null = null;

  constructor(private workerCount: number = DEFAULT_WORKER_COUNT) {}

  async initialize(settings: OcrSettings): Promise<void> {
    const profile: WorkerProfile = { language: settings.language, imageDpi: settings.imageDpi };

    // Callers arriving while a pool is being built wait for it, then check
    // whether it fits their settings.
    while (this.pending) {
      await this.pending;
    }

    if (this.scheduler && this.profile && sameProfile(this.profile, profile)) {
      return;
    }

    const pending = this.replacePool(profile);
    this.pending = pending;
    try {
      await pending;
    } finally {
      if (this.pending === pending) {
        this.pending = null;
      }
    }
  }

  private async replacePool(profile: WorkerProfile): Promise<void> {
    // Workers are bound to a language at creation, so a settings change
    // means a fresh pool.
    await this.shutdownPool();

    const scheduler = Tesseract.createScheduler();

    try {
      for (let i = 0; i < this.workerCount; i++) {
        const worker = await Tesseract.createWorker(profile.language, TESSERACT_OEM, {
          logger: createOcrLogger(),
        });
        scheduler.addWorker(worker);
        if (profile.imageDpi !== null) {
          await worker.setParameters({ user_defined_dpi: String(profile.imageDpi) });
        }
      }
    } catch (error) {
      await scheduler.terminate();
      throw error;
    }

    this.scheduler = scheduler;
    this.profile = profile;
    logger.info(`Tesseract initialized with ${this.workerCount} workers (${profile.language})`);
  }

  private async shutdownPool(): Promise<void> {
    if (this.scheduler) {
      const scheduler = this.scheduler;
      this.scheduler = null;
      this.profile = null;
      await scheduler.terminate();
      logger.info('Tesseract scheduler terminated');
    }
  }

  async recognizePage(
    imageBuffer: Buffer,
    pageNumber: number,
    settings: OcrSettings
  ): Promise<OcrPage> {
    if (!this.scheduler) {
      throw new Error('OcrService not initialized. Call initialize() first.');
    }

    if (imageBuffer.length === 0) {
      throw new Error(`Invalid image buffer for page ${pageNumber}: buffer is empty`);
    }

    const startTime = Date.now();
    const result = await this.scheduler.addJob(OCR_RECOGNIZE_JOB, imageBuffer, {
      rotateAuto: settings.rotate,
    });
    logger.debug(`OCR completed for page ${pageNumber} in ${Date.now() - startTime}ms`);

    const text = result.data.text.trim();
    if (text.length === 0) {
      logger.warn(`No text extracted from page ${pageNumber}. This may be a blank page or image-only content.`);
    }

    return {
      page: pageNumber,
      text,
      confidence: result.data.confidence / CONFIDENCE_SCALE,
    };
  }

  async recognizePages(imageBuffers: Buffer[], settings: OcrSettings): Promise<OcrResult> {
    if (imageBuffers.length === 0) {
      throw new Error('No image buffers provided for OCR processing');
    }

    const selected = selectPages(imageBuffers, settings);
    if (selected.length > MAX_PAGES) {
      throw new Error(`Too many pages (${selected.length}). Maximum supported is ${MAX_PAGES} pages.`);
    }

    await this.initialize(settings);

    const pages: OcrPage[] = [];
    const failedPages: OcrResult['failedPages'] = [];

    await Promise.all(
      selected.map(async (buffer, index) => {
        const pageNumber = index + FIRST_PAGE_NUMBER;
        try {
          pages.push(await this.recognizePage(buffer, pageNumber, settings));
        } catch (error) {
          const message = error instanceof Error ? error.message : 'Unknown error';
          failedPages.push({ page: pageNumber, error: message });
          logger.error(`Failed to process page ${pageNumber}:`, message);
        }
      })
    );

    if (failedPages.length > 0 && pages.length === 0) {
      throw new Error(
        `OCR failed on all ${selected.length} pages. First error: ${failedPages[0].error}`
      );
    }

    return {
      language: settings.language,
      pages: pages.sort((a, b) => a.page - b.page),
      failedPages: failedPages.sort((a, b) => a.page - b.page),
    };
  }

  /**
   * Renders one page image as a PDF carrying the recognized text as an
   * invisible layer.
   */
  async createSearchablePdf(imageBuffer: Buffer, settings: OcrSettings): Promise<Buffer> {
    if (imageBuffer.length === 0) {
      throw new Error('Invalid image buffer: buffer is empty');
    }

    await this.initialize(settings);
    if (!this.scheduler) {
      throw new Error('OcrService not initialized. Call initialize() first.');
    }

    const result = await this.scheduler.addJob(
      OCR_RECOGNIZE_JOB,
      imageBuffer,
      { rotateAuto: settings.rotate },
      { pdf: true }
    );
    if (!result.data.pdf) {
      throw new Error('OCR engine returned no PDF output');
    }
    return Buffer.from(result.data.pdf);
  }

  async terminate(): Promise<void> {
    if (this.pending) {
      // A failed build leaves no pool behind; its error belongs to initialize().
      await Promise.allSettled([this.pending]);
    }
    await this.shutdownPool();
  }
}

let ocrService: OcrService | null = null;

export function getOcrService(): OcrService {
  if (!ocrService) {
    ocrService = new OcrService();
  }
  return ocrService;
}
