import { Router, type RequestHandler } from 'express';
import multer from 'multer';
import { loadConfig } from '../../config/env';
import { getOcrService } from '../../services/ocr/OcrService';
import { getOcrSettings } from '../../services/ocr/OcrSettingsService';
import { AppError } from '../../utils/errors';
import { asyncHandler } from '../middleware/errorHandler';

const router = Router();

const HTTP_STATUS_BAD_REQUEST = 400;
const BYTES_PER_MEGABYTE = 1024 * 1024;
const MAX_PAGE_FILES = 100;
const PAGE_FIELD_NAME = 'pages';
const IMAGE_MIME_PREFIX = 'image/';

let upload: multer.Multer | null = null;

// Built on first use so the size limit comes from the loaded configuration.
function getUpload(): multer.Multer {
  if (!upload) {
    upload = multer({
      storage: multer.memoryStorage(),
      limits: {
        fileSize: loadConfig().MAX_FILE_SIZE_MB * BYTES_PER_MEGABYTE,
        files: MAX_PAGE_FILES,
      },
      fileFilter: (req, file, cb) => {
        if (file.mimetype.startsWith(IMAGE_MIME_PREFIX)) {
          cb(null, true);
        } else {
          cb(new AppError(HTTP_STATUS_BAD_REQUEST, 'Only page images are accepted'));
        }
      },
    });
  }
  return upload;
}

const uploadPages: RequestHandler = (req, res, next) =>
  getUpload().array(PAGE_FIELD_NAME, MAX_PAGE_FILES)(req, res, next);

router.get(
  '/settings',
  asyncHandler(async (req, res) => {
    res.json(await getOcrSettings());
  })
);

/**
 * Recognizes the uploaded page images, one file per page, in upload order.
 */
router.post(
  '/recognize',
  uploadPages,
  asyncHandler(async (req, res) => {
    const files = Array.isArray(req.files) ? req.files : [];
    if (files.length === 0) {
      throw new AppError(HTTP_STATUS_BAD_REQUEST, `No page images uploaded in field "${PAGE_FIELD_NAME}"`);
    }

    const settings = await getOcrSettings();
    const result = await getOcrService().recognizePages(
      files.map((file) => file.buffer),
      settings
    );

    res.json(result);
  })
);

export default router;
