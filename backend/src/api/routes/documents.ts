import { Router } from 'express';
import { z } from 'zod';
import { ArchiveRequestSchema } from '@docshelf/shared/schemas/documents.zod';
import { DocumentArchiver } from '../../services/documents/DocumentArchiver';
import { getDocumentDecrypter } from '../../services/documents/DocumentDecrypter';
import { getDocumentPaths } from '../../services/documents/DocumentPaths';
import { DocumentRenamer } from '../../services/documents/DocumentRenamer';
import { getDocumentStore } from '../../services/documents/DocumentStore';
import { getFilenameGenerator } from '../../services/documents/FilenameGenerator';
import { SanityChecker, hasErrors, hasWarnings } from '../../services/documents/SanityChecker';
import { OcrArchiveRenderer } from '../../services/ocr/OcrArchiveRenderer';
import { getOcrService } from '../../services/ocr/OcrService';
import { NotFoundError } from '../../utils/errors';
import { asyncHandler } from '../middleware/errorHandler';

const router = Router();

const DocumentIdSchema = z.coerce.number().int().positive();

router.post(
  '/sanity-check',
  asyncHandler(async (req, res) => {
    const checker = new SanityChecker(getDocumentStore(), getDocumentPaths());
    const report = await checker.run();

    res.json({
      ...report,
      hasErrors: hasErrors(report),
      hasWarnings: hasWarnings(report),
    });
  })
);

router.post(
  '/rename',
  asyncHandler(async (req, res) => {
    const renamer = new DocumentRenamer(getDocumentStore(), getDocumentPaths(), getFilenameGenerator());
    const renamed = await renamer.renameAll();

    res.json({ renamed });
  })
);

router.post(
  '/archive',
  asyncHandler(async (req, res) => {
    const options = ArchiveRequestSchema.parse(req.body ?? {});
    const archiver = new DocumentArchiver(
      getDocumentStore(),
      getDocumentPaths(),
      getFilenameGenerator(),
      new OcrArchiveRenderer(getOcrService())
    );

    res.json(await archiver.archiveAll(options));
  })
);

router.post(
  '/decrypt',
  asyncHandler(async (req, res) => {
    const decrypted = await getDocumentDecrypter().decryptAll();

    res.json({ decrypted });
  })
);

router.get(
  '/:id',
  asyncHandler(async (req, res) => {
    const id = DocumentIdSchema.parse(req.params.id);
    const doc = await getDocumentStore().findById(id);
    if (!doc) {
      throw new NotFoundError(`Document ${id} not found`);
    }

    const paths = getDocumentPaths();
    res.json({
      ...doc,
      has_archive_version: doc.archive_filename !== null,
      source_path: paths.sourcePath(doc),
      archive_path: paths.archivePath(doc),
      thumbnail_path: paths.thumbnailPath(doc),
      public_filename: paths.publicFilename(doc),
      public_archive_filename: doc.archive_filename !== null
        ? paths.publicFilename(doc, { archive: true })
        : null,
    });
  })
);

export default router;
