import type { DocumentModel, DocumentRepository } from '../../models/Document';
import { logger } from '../../utils/logger';
import type { DocumentPaths } from './DocumentPaths';
import type { FilenameGenerator } from './FilenameGenerator';
import { moveFile } from './files';

/**
 * Moves every document's files to the names FILENAME_FORMAT produces and
 * records the new names.
 */
export class DocumentRenamer {
  constructor(
    private repository: DocumentRepository,
    private paths: DocumentPaths,
    private generator: FilenameGenerator
  ) {}

  async renameAll(): Promise<number> {
    let renamed = 0;
    for (const doc of await this.repository.findAll()) {
      const updated = await this.rename(doc);
      if (updated !== doc) {
        renamed++;
      }
    }
    logger.info(`Renamed ${renamed} documents`);
    return renamed;
  }

  /**
   * Returns the same object when nothing had to move.
   */
  async rename(doc: DocumentModel): Promise<DocumentModel> {
    const filename = await this.generator.generateUnique(doc, this.paths);
    const renamed: DocumentModel = { ...doc, filename };

    const archiveFilename = doc.archive_filename === null
      ? null
      : await this.generator.generateUnique(renamed, this.paths, { archive: true });
    renamed.archive_filename = archiveFilename;

    const oldSource = this.paths.sourcePath(doc);
    const newSource = this.paths.sourcePath(renamed);
    const oldArchive = this.paths.archivePath(doc);
    const newArchive = this.paths.archivePath(renamed);

    if (oldSource === newSource && oldArchive === newArchive) {
      return doc;
    }

    if (oldSource !== newSource) {
      await moveFile(oldSource, newSource);
    }
    if (oldArchive !== null && newArchive !== null && oldArchive !== newArchive) {
      try {
        await moveFile(oldArchive, newArchive);
      } catch (error) {
        if (oldSource !== newSource) {
          await moveFile(newSource, oldSource);
        }
        throw error;
      }
    }

    logger.debug(`Document ${doc.id} moved to ${filename}`);
    return this.repository.update(doc.id, { filename, archive_filename: archiveFilename });
  }
}
