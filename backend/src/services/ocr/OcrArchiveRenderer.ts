import type { OcrSettings } from '@docshelf/shared/schemas/ocr.zod';
import type { DocumentModel } from '../../models/Document';
import { logger } from '../../utils/logger';
import type { ArchiveRenderer } from '../documents/DocumentArchiver';
import type { OcrService } from './OcrService';
import { getOcrSettings } from './OcrSettingsService';

const IMAGE_MIME_PREFIX = 'image/';
const SKIP_ARCHIVE_ALWAYS = 'always';

/**
 * Archives scanned images as searchable PDFs. OCR_SKIP_ARCHIVE_FILE=always
 * turns archiving off.
 */
export class OcrArchiveRenderer implements ArchiveRenderer {
  constructor(
    private ocr: Pick<OcrService, 'createSearchablePdf'>,
    private loadSettings: () => Promise<OcrSettings> = getOcrSettings
  ) {}

  canRender(mimeType: string): boolean {
    return mimeType.toLowerCase().startsWith(IMAGE_MIME_PREFIX);
  }

  async render(source: Buffer, doc: DocumentModel): Promise<Buffer | null> {
    const settings = await this.loadSettings();
    if (settings.skipArchiveFile === SKIP_ARCHIVE_ALWAYS) {
      logger.debug(`OCR_SKIP_ARCHIVE_FILE is ${SKIP_ARCHIVE_ALWAYS}, no archive for document ${doc.id}`);
      return null;
    }
    return this.ocr.createSearchablePdf(source, settings);
  }
}
