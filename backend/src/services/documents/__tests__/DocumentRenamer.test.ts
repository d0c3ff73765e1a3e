import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DocumentPaths, mediaDirectoriesFor, type MediaDirectories } from '../DocumentPaths';
import { DocumentRenamer } from '../DocumentRenamer';
import { FilenameGenerator } from '../FilenameGenerator';
import { InMemoryDocumentRepository, buildDocument } from './fixtures';

describe('DocumentRenamer', () => {
  let mediaRoot: string;
  let dirs: MediaDirectories;
  let paths: DocumentPaths;

  function writeFile(dir: string, name: string): void {
    const filePath = path.join(dir, name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, 'hello');
  }

  function scanDocument() {
    return buildDocument({
      id: 1,
      title: 'test',
      correspondent: null,
      mime_type: 'image/jpeg',
      filename: '0000001.jpg',
      archive_filename: '0000001.pdf',
    });
  }

  beforeEach(() => {
    mediaRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'renamer-'));
    dirs = mediaDirectoriesFor(mediaRoot);
    paths = new DocumentPaths(dirs);
    writeFile(dirs.originalsDir, '0000001.jpg');
    writeFile(dirs.archiveDir, '0000001.pdf');
  });

  afterEach(() => {
    fs.rmSync(mediaRoot, { recursive: true, force: true });
  });

  it('should move original and archive to the formatted names', async () => {
    const repository = new InMemoryDocumentRepository([scanDocument()]);
    const renamer = new DocumentRenamer(
      repository,
      paths,
      new FilenameGenerator('{correspondent}/{title}')
    );

    expect(await renamer.renameAll()).toBe(1);

    const doc = await repository.findById(1);
    expect(doc?.filename).toBe('none/test.jpg');
    expect(doc?.archive_filename).toBe('none/test.pdf');
    expect(fs.existsSync(path.join(dirs.originalsDir, '0000001.jpg'))).toBe(false);
    expect(fs.existsSync(path.join(dirs.archiveDir, '0000001.pdf'))).toBe(false);
    expect(fs.existsSync(path.join(dirs.originalsDir, 'none', 'test.jpg'))).toBe(true);
    expect(fs.existsSync(path.join(dirs.archiveDir, 'none', 'test.pdf'))).toBe(true);
  });

  it('should leave documents alone when the names already match', async () => {
    const original = scanDocument();
    const repository = new InMemoryDocumentRepository([original]);
    const renamer = new DocumentRenamer(repository, paths, new FilenameGenerator(''));

    expect(await renamer.rename(original)).toBe(original);
    expect(await renamer.renameAll()).toBe(0);
    expect(fs.existsSync(path.join(dirs.originalsDir, '0000001.jpg'))).toBe(true);
  });

  it('should add a counter when another file holds the name', async () => {
    writeFile(dirs.originalsDir, 'none/test.jpg');
    const repository = new InMemoryDocumentRepository([scanDocument()]);
    const renamer = new DocumentRenamer(
      repository,
      paths,
      new FilenameGenerator('{correspondent}/{title}')
    );

    const doc = await renamer.rename(scanDocument());

    expect(doc.filename).toBe('none/test_01.jpg');
    expect(doc.archive_filename).toBe('none/test_01.pdf');
  });

  it('should only move the original of a document without archive', async () => {
    const withoutArchive = buildDocument({
      id: 1,
      title: 'test',
      correspondent: null,
      mime_type: 'image/jpeg',
      filename: '0000001.jpg',
    });
    const repository = new InMemoryDocumentRepository([withoutArchive]);
    const renamer = new DocumentRenamer(repository, paths, new FilenameGenerator('{title}'));

    const doc = await renamer.rename(withoutArchive);

    expect(doc.filename).toBe('test.jpg');
    expect(doc.archive_filename).toBeNull();
    expect(fs.existsSync(path.join(dirs.archiveDir, '0000001.pdf'))).toBe(true);
  });

  it('should move the original back when the archive cannot be moved', async () => {
    fs.rmSync(path.join(dirs.archiveDir, '0000001.pdf'));
    const repository = new InMemoryDocumentRepository([scanDocument()]);
    const renamer = new DocumentRenamer(repository, paths, new FilenameGenerator('{title}'));

    await expect(renamer.rename(scanDocument())).rejects.toThrow(/ENOENT/);

    expect(fs.existsSync(path.join(dirs.originalsDir, '0000001.jpg'))).toBe(true);
    expect(fs.existsSync(path.join(dirs.originalsDir, 'test.jpg'))).toBe(false);
    expect((await repository.findById(1))?.filename).toBe('0000001.jpg');
  });
});
