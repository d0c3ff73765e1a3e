import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DocumentPaths, mediaDirectoriesFor, type MediaDirectories } from '../DocumentPaths';
import { FilenameGenerator } from '../FilenameGenerator';
import { buildDocument } from './fixtures';

describe('FilenameGenerator', () => {
  describe('generate', () => {
    it('should use the padded id when no format is set', () => {
      const generator = new FilenameGenerator('');

      expect(generator.generate(buildDocument())).toBe('0000004.pdf');
      expect(generator.generate(buildDocument({ mime_type: 'image/jpeg' }))).toBe('0000004.jpg');
    });

    it('should keep the .gpg suffix for encrypted originals only', () => {
      const generator = new FilenameGenerator('');
      const doc = buildDocument({ storage_type: 'gpg' });

      expect(generator.generate(doc)).toBe('0000004.pdf.gpg');
      expect(generator.generate(doc, { archive: true })).toBe('0000004.pdf');
    });

    it('should give archives a .pdf extension', () => {
      const generator = new FilenameGenerator('{title}');

      expect(generator.generate(buildDocument({ mime_type: 'image/png' }), { archive: true })).toBe(
        'Lease.pdf'
      );
    });

    it('should expand placeholders into directories', () => {
      const generator = new FilenameGenerator('{correspondent}/{title}');

      expect(generator.generate(buildDocument())).toBe('ACME/Lease.pdf');
    });

    it('should write none for a missing correspondent', () => {
      const generator = new FilenameGenerator('{correspondent}/{title}');

      expect(generator.generate(buildDocument({ correspondent: null }))).toBe('none/Lease.pdf');
    });

    it('should write none for an empty title', () => {
      const generator = new FilenameGenerator('{title}');

      expect(generator.generate(buildDocument({ title: '' }))).toBe('none.pdf');
    });

    it('should expand date and serial number placeholders', () => {
      const generator = new FilenameGenerator('{created_year}/{created_month}/{created_day} {asn}');

      expect(generator.generate(buildDocument({ archive_serial_number: 17 }))).toBe(
        '2023/04/05 17.pdf'
      );
      expect(new FilenameGenerator('{added}').generate(buildDocument())).toBe('2023-04-05.pdf');
    });

    it('should replace slashes inside values', () => {
      const generator = new FilenameGenerator('{correspondent}/{title}');

      expect(generator.generate(buildDocument({ correspondent: 'A/B', title: 'x:y' }))).toBe(
        'A-B/x-y.pdf'
      );
    });

    it('should drop empty path segments', () => {
      const generator = new FilenameGenerator('/{title}//');

      expect(generator.generate(buildDocument())).toBe('Lease.pdf');
    });

    it('should append a two-digit counter', () => {
      const generator = new FilenameGenerator('{title}');

      expect(generator.generate(buildDocument(), { counter: 1 })).toBe('Lease_01.pdf');
      expect(generator.generate(buildDocument(), { counter: 0 })).toBe('Lease.pdf');
    });

    it('should fall back to the padded id for an unknown placeholder', () => {
      const generator = new FilenameGenerator('{tag}/{title}');

      expect(generator.generate(buildDocument())).toBe('0000004.pdf');
    });
  });

  describe('generateUnique', () => {
    let mediaRoot: string;
    let dirs: MediaDirectories;
    let paths: DocumentPaths;

    function writeFile(dir: string, name: string): void {
      const filePath = path.join(dir, name);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, 'hello');
    }

    beforeEach(() => {
      mediaRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'filenames-'));
      dirs = mediaDirectoriesFor(mediaRoot);
      paths = new DocumentPaths(dirs);
    });

    afterEach(() => {
      fs.rmSync(mediaRoot, { recursive: true, force: true });
    });

    it('should return the plain name when it is free', async () => {
      const generator = new FilenameGenerator('{correspondent}/{title}');

      expect(await generator.generateUnique(buildDocument(), paths)).toBe('ACME/Lease.pdf');
    });

    it('should count up past names taken by other files', async () => {
      const generator = new FilenameGenerator('{correspondent}/{title}');
      writeFile(dirs.originalsDir, 'ACME/Lease.pdf');
      writeFile(dirs.originalsDir, 'ACME/Lease_01.pdf');

      expect(await generator.generateUnique(buildDocument(), paths)).toBe('ACME/Lease_02.pdf');
    });

    it('should keep the name the document already occupies', async () => {
      const generator = new FilenameGenerator('{correspondent}/{title}');
      writeFile(dirs.originalsDir, 'ACME/Lease.pdf');

      const doc = buildDocument({ filename: 'ACME/Lease.pdf' });

      expect(await generator.generateUnique(doc, paths)).toBe('ACME/Lease.pdf');
    });

    it('should name the archive after the original when that name is free', async () => {
      const generator = new FilenameGenerator('');
      const doc = buildDocument({ id: 2, filename: 'document_01.pdf' });

      expect(await generator.generateUnique(doc, paths, { archive: true })).toBe('document_01.pdf');
    });

    it('should fall back to the generated archive name when the original name is taken', async () => {
      const generator = new FilenameGenerator('');
      writeFile(dirs.archiveDir, 'document_01.pdf');
      const doc = buildDocument({ id: 2, filename: 'document_01.pdf' });

      expect(await generator.generateUnique(doc, paths, { archive: true })).toBe('0000002.pdf');
    });

    it('should strip .gpg before deriving the archive name', async () => {
      const generator = new FilenameGenerator('');
      const doc = buildDocument({ storage_type: 'gpg', filename: 'scan.jpg.gpg' });

      expect(await generator.generateUnique(doc, paths, { archive: true })).toBe('scan.pdf');
    });
  });
});
