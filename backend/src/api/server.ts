import express, { Express } from 'express';
import cors from 'cors';
import { loadConfig } from '../config/env';
import { requestLogger } from './middleware/requestLogger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import configurationRoutes from './routes/configuration';
import filenameRoutes from './routes/filenames';
import ocrRoutes from './routes/ocr';
import documentRoutes from './routes/documents';

const JSON_SIZE_LIMIT = '1mb';

export function createApp(): Express {
  const app = express();

  app.use(
    cors({
      origin: loadConfig().FRONTEND_URL,
      credentials: true,
    })
  );

  app.use(express.json({ limit: JSON_SIZE_LIMIT }));

  app.use(requestLogger);

  app.get('/api/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/configuration', configurationRoutes);
  app.use('/api/filenames', filenameRoutes);
  app.use('/api/ocr', ocrRoutes);
  app.use('/api/documents', documentRoutes);

  app.use(notFoundHandler);

  app.use(errorHandler);

  return app;
}
