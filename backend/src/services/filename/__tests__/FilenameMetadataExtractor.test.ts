import { describe, it, expect } from 'vitest';
import {
  FilenameMetadataExtractor,
  parseCreated,
  toParsedFilenameResponse,
} from '../FilenameMetadataExtractor';
import { ConfigurationError } from '../../../utils/errors';

describe('FilenameMetadataExtractor', () => {
  const extractor = new FilenameMetadataExtractor();

  describe('created-title pattern', () => {
    it('should parse a full timestamp and title', () => {
      const parsed = extractor.extract('20230405120000Z - Invoice.pdf');

      expect(parsed.created?.toISOString()).toBe('2023-04-05T12:00:00.000Z');
      expect(parsed.title).toBe('Invoice');
    });

    it('should pad a date-only prefix to midnight', () => {
      const parsed = extractor.extract('20230405Z - Invoice.pdf');

      expect(parsed.created?.toISOString()).toBe('2023-04-05T00:00:00.000Z');
      expect(parsed.title).toBe('Invoice');
    });

    it('should accept a lowercase z suffix', () => {
      const parsed = extractor.extract('20230405120000z - Note.txt');

      expect(parsed.created?.toISOString()).toBe('2023-04-05T12:00:00.000Z');
      expect(parsed.title).toBe('Note');
    });

    it('should accept a timestamp without the Z suffix', () => {
      const parsed = extractor.extract('20230405 - Scan.pdf');

      expect(parsed.created?.toISOString()).toBe('2023-04-05T00:00:00.000Z');
      expect(parsed.title).toBe('Scan');
    });

    it('should keep the title when the date is not a real calendar date', () => {
      const parsed = extractor.extract('20231340120000Z - Receipt.pdf');

      expect(parsed.created).toBeNull();
      expect(parsed.title).toBe('Receipt');
    });

    it('should reject a day that does not exist in the month', () => {
      const parsed = extractor.extract('20230230Z - February.pdf');

      expect(parsed.created).toBeNull();
      expect(parsed.title).toBe('February');
    });

    it('should reject hour 24 and keep the title', () => {
      const parsed = extractor.extract('20230405240000Z - Invoice.pdf');

      expect(parsed.created).toBeNull();
      expect(parsed.title).toBe('Invoice');
    });

    it('should reject year zero', () => {
      const parsed = extractor.extract('00000101Z - Old.pdf');

      expect(parsed.created).toBeNull();
      expect(parsed.title).toBe('Old');
    });

    it('should keep dashes inside the title', () => {
      const parsed = extractor.extract('20230405Z - ACME - Q1 report.pdf');

      expect(parsed.title).toBe('ACME - Q1 report');
    });
  });

  describe('fallback pattern', () => {
    it('should use the whole name as title', () => {
      const parsed = extractor.extract('plain-name.pdf');

      expect(parsed.created).toBeNull();
      expect(parsed.title).toBe('plain-name');
    });

    it('should treat a digit run of the wrong length as part of the title', () => {
      const parsed = extractor.extract('2023040512 - Draft.pdf');

      expect(parsed.created).toBeNull();
      expect(parsed.title).toBe('2023040512 - Draft');
    });

    it('should only strip the last extension', () => {
      expect(extractor.extract('backup.tar.gz').title).toBe('backup.tar');
    });

    it('should keep names without an extension', () => {
      expect(extractor.extract('README').title).toBe('README');
    });

    it('should return an empty title for a bare extension', () => {
      const parsed = extractor.extract('.pdf');

      expect(parsed.created).toBeNull();
      expect(parsed.title).toBe('');
    });

    it('should return an empty title for an empty filename', () => {
      expect(extractor.extract('').title).toBe('');
    });

    it('should match names spanning several lines', () => {
      expect(extractor.extract('first\nsecond.pdf').title).toBe('first\nsecond');
    });
  });

  describe('pass-through fields', () => {
    it('should leave correspondent, tags and extension empty', () => {
      const parsed = extractor.extract('20230405Z - Invoice.pdf');

      expect(parsed.correspondent).toBeNull();
      expect(parsed.tags).toEqual([]);
      expect(parsed.extension).toBeNull();
    });
  });

  describe('transforms', () => {
    it('should rewrite the filename before parsing', () => {
      const withTransforms = new FilenameMetadataExtractor([
        { pattern: '^Scan_(\\d{8})_', repl: '$1Z - ' },
      ]);

      const parsed = withTransforms.extract('Scan_20230405_Lease.pdf');

      expect(parsed.created?.toISOString()).toBe('2023-04-05T00:00:00.000Z');
      expect(parsed.title).toBe('Lease');
    });

    it('should apply only the first matching transform', () => {
      const withTransforms = new FilenameMetadataExtractor([
        { pattern: 'a', repl: 'b' },
        { pattern: 'b', repl: 'c' },
      ]);

      expect(withTransforms.extract('aab.pdf').title).toBe('bbb');
    });

    it('should fall through to later transforms when earlier ones do not match', () => {
      const withTransforms = new FilenameMetadataExtractor([
        { pattern: '^nomatch', repl: '' },
        { pattern: 'y', repl: 'Y' },
      ]);

      expect(withTransforms.extract('xyz.pdf').title).toBe('xYz');
    });

    it('should let a transform change the extension', () => {
      const withTransforms = new FilenameMetadataExtractor([
        { pattern: '\\.pdf\\.bak$', repl: '.pdf' },
      ]);

      expect(withTransforms.extract('contract.pdf.bak').title).toBe('contract');
    });

    it('should reject an invalid pattern', () => {
      expect(() => new FilenameMetadataExtractor([{ pattern: '(', repl: '' }])).toThrow(
        ConfigurationError
      );
    });
  });

  it('should return the same result for repeated calls', () => {
    const withTransforms = new FilenameMetadataExtractor([{ pattern: '_', repl: ' ' }]);

    const first = withTransforms.extract('20230405Z - tax_return.pdf');
    const second = withTransforms.extract('20230405Z - tax_return.pdf');

    expect(second).toEqual(first);
    expect(first.title).toBe('tax return');
  });
});

describe('parseCreated', () => {
  it('should parse 14 digits with Z', () => {
    expect(parseCreated('20221231235959Z')?.toISOString()).toBe('2022-12-31T23:59:59.000Z');
  });

  it('should return null for an invalid minute', () => {
    expect(parseCreated('20221231236100Z')).toBeNull();
  });

  it('should return null for hour 24 instead of rolling over', () => {
    expect(parseCreated('20230405240000Z')).toBeNull();
  });

  it('should return null for year zero', () => {
    expect(parseCreated('00000101Z')).toBeNull();
  });
});

describe('toParsedFilenameResponse', () => {
  it('should serialize the creation date as ISO string', () => {
    const extractor = new FilenameMetadataExtractor();

    expect(toParsedFilenameResponse(extractor.extract('20230405120000Z - Invoice.pdf'))).toEqual({
      created: '2023-04-05T12:00:00.000Z',
      title: 'Invoice',
      correspondent: null,
      tags: [],
      extension: null,
    });
  });

  it('should keep a missing date as null', () => {
    const extractor = new FilenameMetadataExtractor();

    expect(toParsedFilenameResponse(extractor.extract('notes.txt')).created).toBeNull();
  });
});
