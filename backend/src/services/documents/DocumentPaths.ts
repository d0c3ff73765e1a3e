import path from 'path';
import { loadConfig, resolveFromBackend } from '../../config/env';
import { STORAGE_TYPE_GPG, type DocumentModel } from '../../models/Document';

const ID_PAD_LENGTH = 7;
const COUNTER_PAD_LENGTH = 2;
const GPG_SUFFIX = '.gpg';
const THUMBNAIL_EXTENSION = '.webp';
const ARCHIVE_EXTENSION = '.pdf';
const FILENAME_REPLACEMENT = '-';
const MAX_FILENAME_LENGTH = 255;

// Reserved on at least one supported filesystem, plus control characters.
const INVALID_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f\u007f]/g;

const DEFAULT_FILE_EXTENSIONS: Record<string, string> = {
  'application/pdf': '.pdf',
  'image/jpeg': '.jpg',
  'image/png': '.png',
  'image/tiff': '.tif',
  'image/gif': '.gif',
  'image/webp': '.webp',
  'image/bmp': '.bmp',
  'image/heic': '.heic',
  'text/plain': '.txt',
  'text/csv': '.csv',
  'message/rfc822': '.eml',
  'application/msword': '.doc',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document': '.docx',
  'application/vnd.oasis.opendocument.text': '.odt',
};

export interface MediaDirectories {
  originalsDir: string;
  archiveDir: string;
  thumbnailDir: string;
}

export interface PublicFilenameOptions {
  archive?: boolean;
  counter?: number;
  suffix?: string;
}

export function mediaDirectoriesFor(mediaRoot: string): MediaDirectories {
  const documentsDir = path.join(mediaRoot, 'documents');
  return {
    originalsDir: path.join(documentsDir, 'originals'),
    archiveDir: path.join(documentsDir, 'archive'),
    thumbnailDir: path.join(documentsDir, 'thumbnails'),
  };
}

export function fileType(mimeType: string): string {
  return DEFAULT_FILE_EXTENSIONS[mimeType.toLowerCase()] ?? '';
}

export function sanitizeFilename(filename: string): string {
  return filename
    .replace(INVALID_FILENAME_CHARS, FILENAME_REPLACEMENT)
    .trim()
    .slice(0, MAX_FILENAME_LENGTH);
}

export function padId(id: number): string {
  return String(id).padStart(ID_PAD_LENGTH, '0');
}

/**
 * Locates the files a document owns below the media root.
 */
export class DocumentPaths {
  constructor(private dirs: MediaDirectories) {}

  get directories(): MediaDirectories {
    return this.dirs;
  }

  sourcePath(doc: DocumentModel): string {
    let filename: string;
    if (doc.filename) {
      filename = doc.filename;
    } else {
      filename = `${padId(doc.id)}${fileType(doc.mime_type)}`;
      if (doc.storage_type === STORAGE_TYPE_GPG) {
        filename += GPG_SUFFIX;
      }
    }
    return path.resolve(this.dirs.originalsDir, filename);
  }

  archivePath(doc: DocumentModel): string | null {
    if (doc.archive_filename === null) {
      return null;
    }
    return path.resolve(this.dirs.archiveDir, doc.archive_filename);
  }

  thumbnailPath(doc: DocumentModel): string {
    let filename = `${padId(doc.id)}${THUMBNAIL_EXTENSION}`;
    if (doc.storage_type === STORAGE_TYPE_GPG) {
      filename += GPG_SUFFIX;
    }
    return path.resolve(this.dirs.thumbnailDir, filename);
  }

  /**
   * Filename offered on download: created date, correspondent and title,
   * without any directory.
   */
  publicFilename(doc: DocumentModel, options: PublicFilenameOptions = {}): string {
    let result = doc.created.slice(0, 10);

    if (doc.correspondent) {
      result += ` ${doc.correspondent}`;
    }
    if (doc.title) {
      result += ` ${doc.title}`;
    }
    if (options.counter) {
      result += `_${String(options.counter).padStart(COUNTER_PAD_LENGTH, '0')}`;
    }
    if (options.suffix) {
      result += options.suffix;
    }
    result += options.archive ? ARCHIVE_EXTENSION : fileType(doc.mime_type);

    return sanitizeFilename(result);
  }
}

let documentPaths: DocumentPaths | null = null;

export function getDocumentPaths(): DocumentPaths {
  if (!documentPaths) {
    documentPaths = new DocumentPaths(
      mediaDirectoriesFor(resolveFromBackend(loadConfig().MEDIA_ROOT))
    );
  }
  return documentPaths;
}
