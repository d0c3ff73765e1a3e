import { Router } from 'express';
import { ParseFilenameRequestSchema } from '@docshelf/shared/schemas/configuration.zod';
import {
  getFilenameMetadataExtractor,
  toParsedFilenameResponse,
} from '../../services/filename/FilenameMetadataExtractor';

const router = Router();

router.post('/parse', (req, res) => {
  const { filename } = ParseFilenameRequestSchema.parse(req.body);
  const parsed = getFilenameMetadataExtractor().extract(filename);
  res.json(toParsedFilenameResponse(parsed));
});

export default router;
