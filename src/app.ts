/**
 * Express application: routes the JSON endpoints to the request handlers
 */
import path from 'path';
import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { BookGenerator } from './generator';
import {
  handleConfigureApis,
  handleCreateOutline,
  handleGenerateChapter,
  handleGenerateFullBook,
  handleHealth,
} from './handlers';
import { errorMessage } from './errors';
import { getLogger } from './logger';

const logger = getLogger('app');

const PUBLIC_DIR = path.join(__dirname, '..', 'public');

type Handler = (generator: BookGenerator, payload: unknown) => Promise<object>;

export function createApp(generator: BookGenerator): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  const route = (handler: Handler) => (req: Request, res: Response, next: NextFunction): void => {
    handler(generator, req.body)
      .then(body => {
        res.json(body);
      })
      .catch(next);
  };

  app.get('/', (req, res) => {
    res.sendFile(path.join(PUBLIC_DIR, 'index.html'));
  });

  app.post('/configure-apis', route(handleConfigureApis));
  app.post('/create-outline', route(handleCreateOutline));
  app.post('/generate-chapter', route(handleGenerateChapter));
  app.post('/generate-full-book', route(handleGenerateFullBook));

  app.get('/health', (req, res) => {
    res.json(handleHealth(generator));
  });

  // Failures are reported in the payload, never through the status code
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error(`Request error on ${req.method} ${req.path}: ${errorMessage(error)}`);
    res.status(200).json({ success: false, message: `Error: ${errorMessage(error)}` });
  });

  return app;
}
