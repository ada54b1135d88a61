import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { ServiceFacade } from '../services/ServiceFacade.js';
import { logger } from '../utils/logger.js';
import { parseSeparateRequest } from './schemas.js';
import { errorHandler, notFoundHandler } from './errorHandler.js';

type RouteHandler = (req: Request, res: Response) => Promise<void> | void;

/**
 * Express 4 does not forward rejected promises to the error middleware
 */
function route(handler: RouteHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch(next);
  };
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.debug(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`);
  });
  next();
}

export function createApp(facade: ServiceFacade): express.Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  app.get('/health', route(async (_req, res) => {
    res.json(await facade.health());
  }));

  app.post('/models/load/:modelName', route(async (req, res) => {
    res.json(await facade.loadModel(req.params.modelName));
  }));

  app.post('/models/unload/:modelName', route(async (req, res) => {
    res.json(await facade.unloadModel(req.params.modelName));
  }));

  app.post('/process/separate', route((req, res) => {
    const request = parseSeparateRequest(req.body);
    res.json(facade.submitSeparation(request));
  }));

  app.get('/jobs/:jobId', route((req, res) => {
    res.json(facade.getJob(req.params.jobId));
  }));

  app.post('/jobs/:jobId/cancel', route((req, res) => {
    res.json(facade.cancelJob(req.params.jobId));
  }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
