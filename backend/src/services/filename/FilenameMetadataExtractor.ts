import path from 'path';
import { isValid, parse } from 'date-fns';
import type {
  FilenameTransform,
  ParsedFilenameResponse,
} from '@docshelf/shared/schemas/configuration.zod';
import { loadConfig } from '../../config/env';
import { ConfigurationError } from '../../utils/errors';

const TIMESTAMP_DIGITS = 14;
const TIMESTAMP_PAD_CHAR = '0';
const UTC_SUFFIX_PATTERN = /z$/i;
const HIDDEN_FILE_PREFIX = '.';
const TRANSFORM_FLAGS = 'g';
const CREATED_FORMAT = 'yyyyMMddHHmmssX';
const UTC_DESIGNATOR = 'Z';

export interface ParsedFilename {
  created: Date | null;
  title: string;
  correspondent: string | null;
  tags: string[];
  extension: string | null;
}

interface CompiledTransform {
  regex: RegExp;
  replacement: string;
}

/**
 * Tried in order, first match wins. The last entry matches any string, so
 * every filename yields at least a title.
 */
const FILENAME_PATTERNS: readonly RegExp[] = [
  /^(?<created>\d{8}(?:\d{6})?Z?) - (?<title>.*)$/i,
  /^(?<title>[\s\S]*)$/i,
];

function compileTransform(transform: FilenameTransform): CompiledTransform {
  try {
    return {
      regex: new RegExp(transform.pattern, TRANSFORM_FLAGS),
      replacement: transform.repl,
    };
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Invalid filename transform pattern ${transform.pattern}: ${reason}`);
  }
}

/**
 * Turns a 8 or 14 digit run, optionally ending in Z, into a UTC date.
 * Date-only values are padded to midnight.
 */
export function parseCreated(created: string): Date | null {
  const digits = created.replace(UTC_SUFFIX_PATTERN, '').padEnd(TIMESTAMP_DIGITS, TIMESTAMP_PAD_CHAR);

  // Out-of-range fields (hour 24, year 0, Feb 30) give an invalid date.
  const date = parse(`${digits}${UTC_DESIGNATOR}`, CREATED_FORMAT, new Date(0));
  return isValid(date) ? date : null;
}

function stripExtension(filename: string): string {
  const extension = path.extname(filename);
  const withoutExtension = filename.slice(0, filename.length - extension.length);

  // Names such as ".pdf" carry no text before the file type.
  if (withoutExtension === filename && filename.startsWith(HIDDEN_FILE_PREFIX)) {
    return '';
  }
  return withoutExtension;
}

export class FilenameMetadataExtractor {
  private transforms: CompiledTransform[];

  constructor(transforms: FilenameTransform[] = []) {
    this.transforms = transforms.map(compileTransform);
  }

  extract(rawFilename: string): ParsedFilename {
    const filename = stripExtension(this.applyTransform(rawFilename));

    for (const pattern of FILENAME_PATTERNS) {
      const match = pattern.exec(filename);
      if (!match || !match.groups) {
        continue;
      }

      const { created, title } = match.groups;
      return {
        created: created ? parseCreated(created) : null,
        title: title ?? '',
        correspondent: null,
        tags: [],
        extension: null,
      };
    }

    return { created: null, title: filename, correspondent: null, tags: [], extension: null };
  }

  /**
   * Applies the first transform whose pattern matches, and only that one.
   */
  private applyTransform(filename: string): string {
    for (const transform of this.transforms) {
      if (filename.match(transform.regex)) {
        return filename.replace(transform.regex, transform.replacement);
      }
    }
    return filename;
  }
}

export function toParsedFilenameResponse(parsed: ParsedFilename): ParsedFilenameResponse {
  return {
    ...parsed,
    created: parsed.created ? parsed.created.toISOString() : null,
  };
}

let extractor: FilenameMetadataExtractor | null = null;

export function getFilenameMetadataExtractor(): FilenameMetadataExtractor {
  if (!extractor) {
    extractor = new FilenameMetadataExtractor(loadConfig().FILENAME_PARSE_TRANSFORMS);
  }
  return extractor;
}
