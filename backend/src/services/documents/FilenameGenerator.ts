import path from 'path';
import { loadConfig } from '../../config/env';
import { STORAGE_TYPE_GPG, type DocumentModel } from '../../models/Document';
import { logger } from '../../utils/logger';
import { fileType, padId, sanitizeFilename, type DocumentPaths } from './DocumentPaths';
import { exists } from './files';

const COUNTER_PAD_LENGTH = 2;
const ARCHIVE_EXTENSION = '.pdf';
const GPG_SUFFIX = '.gpg';
const MISSING_VALUE = 'none';
const PATH_SEPARATOR = '/';
const PLACEHOLDER_PATTERN = /\{([a-z_]+)\}/g;

export interface GenerateFilenameOptions {
  archive?: boolean;
  counter?: number;
}

function dateParts(prefix: string, iso: string): Array<[string, string]> {
  return [
    [prefix, iso.slice(0, 10)],
    [`${prefix}_year`, iso.slice(0, 4)],
    [`${prefix}_month`, iso.slice(5, 7)],
    [`${prefix}_day`, iso.slice(8, 10)],
  ];
}

function placeholderValues(doc: DocumentModel): Map<string, string> {
  return new Map([
    ['title', sanitizeFilename(doc.title) || MISSING_VALUE],
    ['correspondent', doc.correspondent ? sanitizeFilename(doc.correspondent) : MISSING_VALUE],
    ['asn', doc.archive_serial_number === null ? MISSING_VALUE : String(doc.archive_serial_number)],
    ...dateParts('created', doc.created),
    ...dateParts('added', doc.added),
  ]);
}

function withoutExtension(filename: string): string {
  const plain = filename.endsWith(GPG_SUFFIX) ? filename.slice(0, -GPG_SUFFIX.length) : filename;
  return plain.slice(0, plain.length - path.extname(plain).length);
}

/**
 * Builds storage filenames from FILENAME_FORMAT, e.g. "{correspondent}/{title}".
 *
 * Placeholders: title, correspondent, asn, created, created_year,
 * created_month, created_day and the same four for added. Slashes in the
 * format create directories; slashes inside values are replaced. An empty
 * format, or one naming an unknown placeholder, falls back to the
 * zero-padded document id.
 */
export class FilenameGenerator {
  constructor(private format: string) {}

  generate(doc: DocumentModel, options: GenerateFilenameOptions = {}): string {
    const base = this.expandFormat(doc) ?? padId(doc.id);
    const counter = options.counter
      ? `_${String(options.counter).padStart(COUNTER_PAD_LENGTH, '0')}`
      : '';
    const extension = options.archive ? ARCHIVE_EXTENSION : fileType(doc.mime_type);

    let filename = `${base}${counter}${extension}`;
    if (!options.archive && doc.storage_type === STORAGE_TYPE_GPG) {
      filename += GPG_SUFFIX;
    }
    return filename;
  }

  /**
   * Picks a filename no other file occupies, counting up from _01. Archive
   * names first try the original's name with a .pdf extension.
   */
  async generateUnique(
    doc: DocumentModel,
    paths: DocumentPaths,
    options: { archive?: boolean } = {}
  ): Promise<string> {
    const archive = options.archive ?? false;
    const { originalsDir, archiveDir } = paths.directories;
    const root = archive ? archiveDir : originalsDir;
    const currentPath = archive ? paths.archivePath(doc) : paths.sourcePath(doc);

    const isFree = async (candidate: string): Promise<boolean> => {
      const candidatePath = path.resolve(root, candidate);
      return candidatePath === currentPath || !(await exists(candidatePath));
    };

    if (archive && doc.filename) {
      const candidate = `${withoutExtension(doc.filename)}${ARCHIVE_EXTENSION}`;
      if (await isFree(candidate)) {
        return candidate;
      }
    }

    for (let counter = 0; ; counter++) {
      const candidate = this.generate(doc, { archive, counter });
      if (await isFree(candidate)) {
        return candidate;
      }
    }
  }

  private expandFormat(doc: DocumentModel): string | null {
    if (this.format.trim() === '') {
      return null;
    }

    const values = placeholderValues(doc);
    const unknown: string[] = [];
    const expanded = this.format.replace(PLACEHOLDER_PATTERN, (placeholder, name: string) => {
      const value = values.get(name);
      if (value === undefined) {
        unknown.push(name);
        return placeholder;
      }
      return value;
    });

    if (unknown.length > 0) {
      logger.warn(`Invalid FILENAME_FORMAT ${this.format}: unknown placeholder ${unknown.join(', ')}`);
      return null;
    }

    const segments = expanded
      .split(PATH_SEPARATOR)
      .map((segment) => segment.trim())
      .filter((segment) => segment.length > 0);
    return segments.length > 0 ? segments.join(PATH_SEPARATOR) : null;
  }
}

let filenameGenerator: FilenameGenerator | null = null;

export function getFilenameGenerator(): FilenameGenerator {
  if (!filenameGenerator) {
    filenameGenerator = new FilenameGenerator(loadConfig().FILENAME_FORMAT);
  }
  return filenameGenerator;
}
