import fs from 'fs/promises';
import path from 'path';
import type { ArchiveSummary } from '@docshelf/shared/schemas/documents.zod';
import {
  STORAGE_TYPE_GPG,
  type DocumentModel,
  type DocumentRepository,
} from '../../models/Document';
import { NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { DocumentPaths } from './DocumentPaths';
import type { FilenameGenerator } from './FilenameGenerator';
import { md5Checksum, writeFileCreatingDirs } from './files';

/**
 * Produces the archive (PDF) version of an original. Returns null when it
 * decides not to produce one for this document.
 */
export interface ArchiveRenderer {
  canRender(mimeType: string): boolean;
  render(source: Buffer, doc: DocumentModel): Promise<Buffer | null>;
}

export interface ArchiveOptions {
  documentId?: number;
  overwrite?: boolean;
}

export class DocumentArchiver {
  constructor(
    private repository: DocumentRepository,
    private paths: DocumentPaths,
    private generator: FilenameGenerator,
    private renderer: ArchiveRenderer
  ) {}

  async archiveAll(options: ArchiveOptions = {}): Promise<ArchiveSummary> {
    const documents = options.documentId === undefined
      ? await this.repository.findAll()
      : [await this.getDocument(options.documentId)];

    const summary: ArchiveSummary = { archived: [], skipped: [], failed: [] };

    for (const doc of documents) {
      if (doc.archive_filename !== null && !options.overwrite) {
        summary.skipped.push(doc.id);
        continue;
      }

      try {
        const archived = await this.archive(doc);
        if (archived) {
          summary.archived.push(doc.id);
        } else {
          summary.skipped.push(doc.id);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown error';
        logger.error(`Failed to archive document ${doc.id}:`, message);
        summary.failed.push({ documentId: doc.id, error: message });
      }
    }

    logger.info(
      `Archived ${summary.archived.length} documents, skipped ${summary.skipped.length}, failed ${summary.failed.length}`
    );
    return summary;
  }

  async archive(doc: DocumentModel): Promise<DocumentModel | null> {
    if (doc.storage_type === STORAGE_TYPE_GPG) {
      logger.warn(`Document ${doc.id} is encrypted, not archiving`);
      return null;
    }
    if (!this.renderer.canRender(doc.mime_type)) {
      logger.warn(`No archive renderer for ${doc.mime_type}, document ${doc.id} keeps no archive version`);
      return null;
    }

    const source = await fs.readFile(this.paths.sourcePath(doc));
    const rendered = await this.renderer.render(source, doc);
    if (!rendered) {
      return null;
    }

    const archiveFilename = await this.generator.generateUnique(doc, this.paths, { archive: true });
    const target = path.resolve(this.paths.directories.archiveDir, archiveFilename);
    await writeFileCreatingDirs(target, rendered);

    const previous = this.paths.archivePath(doc);
    if (previous !== null && previous !== target) {
      await fs.rm(previous, { force: true });
    }

    logger.debug(`Archive of document ${doc.id} written to ${archiveFilename}`);
    return this.repository.update(doc.id, {
      archive_filename: archiveFilename,
      archive_checksum: md5Checksum(rendered),
    });
  }

  private async getDocument(id: number): Promise<DocumentModel> {
    const doc = await this.repository.findById(id);
    if (!doc) {
      throw new NotFoundError(`Document ${id} not found`);
    }
    return doc;
  }
}
