import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import type { SanityLevel, SanityMessage, SanityReport } from '@docshelf/shared/schemas/documents.zod';
import type { DocumentModel, DocumentRepository } from '../../models/Document';
import { logger } from '../../utils/logger';
import type { DocumentPaths } from './DocumentPaths';
import { exists, isMissingFileError, md5Checksum } from './files';

const NO_ISSUES_MESSAGE = 'Sanity checker detected no issues.';

// Left behind by desktop file managers; never reported as orphans.
const IGNORED_FILES = new Set(['.DS_Store', 'desktop.ini']);

export function hasErrors(report: SanityReport): boolean {
  return report.messages.some((message) => message.level === 'error');
}

export function hasWarnings(report: SanityReport): boolean {
  return report.messages.some((message) => message.level === 'warning');
}

async function listFiles(dir: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (isMissingFileError(error)) {
      return [];
    }
    throw error;
  }

  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.resolve(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(entryPath)));
    } else if (entry.isFile() && !IGNORED_FILES.has(entry.name)) {
      files.push(entryPath);
    }
  }
  return files;
}

class SanityReportBuilder {
  private messages: SanityMessage[] = [];

  add(level: SanityLevel, documentId: number | null, message: string): void {
    this.messages.push({ level, documentId, message });
  }

  build(): SanityReport {
    return { messages: this.messages };
  }
}

/**
 * Compares every stored document against the files below the media root:
 * missing files, checksum mismatches, missing thumbnails and files no
 * document references.
 */
export class SanityChecker {
  constructor(
    private repository: DocumentRepository,
    private paths: DocumentPaths
  ) {}

  async check(): Promise<SanityReport> {
    const report = new SanityReportBuilder();
    const { originalsDir, archiveDir } = this.paths.directories;

    const present = new Set([...(await listFiles(originalsDir)), ...(await listFiles(archiveDir))]);

    for (const doc of await this.repository.findAll()) {
      await this.checkDocument(doc, present, report);
    }

    for (const orphan of [...present].sort()) {
      report.add('warning', null, `Orphaned file in media dir: ${orphan}`);
    }

    return report.build();
  }

  async run(): Promise<SanityReport> {
    const report = await this.check();

    if (report.messages.length === 0) {
      logger.info(NO_ISSUES_MESSAGE);
      return report;
    }

    for (const message of report.messages) {
      const prefix = message.documentId === null ? '' : `Document ${message.documentId}: `;
      if (message.level === 'error') {
        logger.error(`${prefix}${message.message}`);
      } else if (message.level === 'warning') {
        logger.warn(`${prefix}${message.message}`);
      } else {
        logger.info(`${prefix}${message.message}`);
      }
    }
    return report;
  }

  private async checkDocument(
    doc: DocumentModel,
    present: Set<string>,
    report: SanityReportBuilder
  ): Promise<void> {
    if (!(await exists(this.paths.thumbnailPath(doc)))) {
      report.add('warning', doc.id, 'Thumbnail of document does not exist.');
    }

    const sourcePath = this.paths.sourcePath(doc);
    present.delete(sourcePath);
    await this.checkFile(doc.id, sourcePath, doc.checksum, 'Original', report);

    const archivePath = this.paths.archivePath(doc);
    if (archivePath === null) {
      return;
    }
    present.delete(archivePath);
    if (!doc.archive_checksum) {
      report.add('error', doc.id, 'Document has an archive file, but its checksum is missing.');
      return;
    }
    await this.checkFile(doc.id, archivePath, doc.archive_checksum, 'Archived', report);
  }

  private async checkFile(
    documentId: number,
    filePath: string,
    storedChecksum: string,
    label: string,
    report: SanityReportBuilder
  ): Promise<void> {
    let content: Buffer;
    try {
      content = await fs.readFile(filePath);
    } catch (error) {
      if (isMissingFileError(error)) {
        report.add('error', documentId, `${label} of document does not exist.`);
      } else {
        const reason = error instanceof Error ? error.message : 'Unknown error';
        report.add('error', documentId, `Cannot read ${label.toLowerCase()} file of document: ${reason}`);
      }
      return;
    }

    const checksum = md5Checksum(content);
    if (checksum !== storedChecksum) {
      report.add('error', documentId, `Checksum mismatch. Stored: ${storedChecksum}, actual: ${checksum}.`);
    }
  }
}
