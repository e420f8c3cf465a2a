import express from 'express';
import type { ErrorRequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { analyzeComponents, analyzeContours } from './trace/index';
import { TopologyError } from './trace/errors';
import { componentsRequestSchema, contoursRequestSchema, parseRequest } from './validation';
import type { ServerConfig } from './config';
import type { ErrorResponse } from '../../../shared/types';

export interface HttpFailure {
  status: number;
  body: ErrorResponse;
}

const STATUS_BY_CODE: Record<string, number> = {
  GRID_TOO_LARGE: 413,
};

/**
 * Map a thrown value to an HTTP status and JSON body
 */
export function toHttpFailure(error: unknown, nodeEnv: string): HttpFailure {
  const details = nodeEnv === 'development' && error instanceof Error ? error.stack : undefined;

  if (error instanceof TopologyError) {
    const status = STATUS_BY_CODE[error.code] ?? 500;
    return { status, body: { error: error.message, code: error.code, details } };
  }

  return {
    status: 500,
    body: {
      error: error instanceof Error ? error.message : 'Internal server error',
      code: 'PROCESSING_ERROR',
      details,
    },
  };
}

// body-parser attaches `type` and `status` to the errors it raises
function isBodyParserError(error: unknown): error is Error & { type: string; status: number } {
  return error instanceof Error && typeof Reflect.get(error, 'type') === 'string' && typeof Reflect.get(error, 'status') === 'number';
}

export function createApp(config: ServerConfig): express.Express {
  const app = express();
  const limits = { maxGridPixels: config.maxGridPixels };

  // Security and performance middleware
  app.use(helmet());
  app.use(cors({ origin: config.corsOrigins }));
  app.use(compression());

  app.use(express.json({ limit: config.bodyLimit }));

  app.get('/api/health', (req, res) => {
    res.json({ ok: true, timestamp: new Date().toISOString() });
  });

  app.post('/api/components', (req, res) => {
    const parsed = parseRequest(componentsRequestSchema, req.body);
    if (!parsed.success) {
      res.status(400).json(parsed.error);
      return;
    }

    try {
      res.json(analyzeComponents(parsed.data, limits));
    } catch (error) {
      console.error('Components API error:', error);
      const failure = toHttpFailure(error, config.nodeEnv);
      res.status(failure.status).json(failure.body);
    }
  });

  app.post('/api/contours', (req, res) => {
    const parsed = parseRequest(contoursRequestSchema, req.body);
    if (!parsed.success) {
      res.status(400).json(parsed.error);
      return;
    }

    try {
      res.json(analyzeContours(parsed.data, limits));
    } catch (error) {
      console.error('Contours API error:', error);
      const failure = toHttpFailure(error, config.nodeEnv);
      res.status(failure.status).json(failure.body);
    }
  });

  app.use((req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  // Error handling middleware
  const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isBodyParserError(error)) {
      res.status(error.status).json({ error: error.message, code: 'INVALID_BODY' });
      return;
    }

    console.error('Unhandled error:', error);
    const failure = toHttpFailure(error, config.nodeEnv);
    res.status(failure.status).json(failure.body);
  };
  app.use(errorHandler);

  return app;
}
